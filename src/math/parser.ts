import { Sign, Term, TermSchema } from './schemas.js';
import { OverflowError, ParseError } from './errors.js';

export const DEFAULT_MAX_DICE = 10_000;

export interface ParseOptions {
    /** Upper bound on the number of dice across the whole expression. */
    maxDice?: number;
}

export interface ExpressionBounds {
    min: number;
    max: number;
}

const DIE_ROLL_PATTERN = /^(\d+)[dD](\d+)$/;
const MODIFIER_PATTERN = /^\d+$/;

export function normalizeExpression(expression: string): string {
    return expression.replace(/\s+/g, '');
}

/**
 * Parse an expression such as "3d6 + 4" or "-1d4+2d8-1" into signed terms.
 *
 * The expression is split on every `+` and `-`; each clause between them must
 * be either `NdM` or a bare integer. Any other clause, including an empty one
 * left by a doubled or trailing operator, rejects the whole expression.
 */
export function parseExpression(expression: string, options: ParseOptions = {}): Term[] {
    const drex = normalizeExpression(expression);
    if (drex.length === 0) {
        throw new ParseError('Dice expression is empty', expression);
    }

    const terms: Term[] = [];
    let sign: Sign = 1;
    let start = 0;

    if (drex[0] === '+' || drex[0] === '-') {
        sign = drex[0] === '-' ? -1 : 1;
        start = 1;
    }

    for (let i = start; i <= drex.length; i++) {
        const ch = drex[i];
        if (i === drex.length || ch === '+' || ch === '-') {
            terms.push(parseClause(drex.slice(start, i), sign, expression, start));
            sign = ch === '-' ? -1 : 1;
            start = i + 1;
        }
    }

    checkLimits(terms, expression, options.maxDice ?? DEFAULT_MAX_DICE);
    return terms;
}

/**
 * Check terms that did not come from parseExpression: same shape rules, same
 * limits. Throws ParseError naming the first bad term.
 */
export function validateTerms(terms: readonly Term[], options: ParseOptions = {}): Term[] {
    const expression = JSON.stringify(terms);
    const parsed = TermSchema.array().safeParse(terms);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new ParseError(`Invalid term${where}: ${issue.message}`, expression);
    }

    checkLimits(parsed.data, expression, options.maxDice ?? DEFAULT_MAX_DICE);
    return parsed.data;
}

function parseClause(clause: string, sign: Sign, expression: string, position: number): Term {
    if (clause.length === 0) {
        throw new ParseError(`Missing term at position ${position} in "${expression}"`, expression, clause, position);
    }

    const dice = DIE_ROLL_PATTERN.exec(clause);
    if (dice) {
        const count = parseLiteral(dice[1], clause, expression, position);
        const sides = parseLiteral(dice[2], clause, expression, position);
        if (count < 1) {
            throw new ParseError(`Die count must be at least 1 in "${clause}"`, expression, clause, position);
        }
        if (sides < 1) {
            throw new ParseError(`Die sides must be at least 1 in "${clause}"`, expression, clause, position);
        }
        return { kind: 'dice', count, sides, sign };
    }

    if (MODIFIER_PATTERN.test(clause)) {
        return { kind: 'modifier', value: parseLiteral(clause, clause, expression, position), sign };
    }

    throw new ParseError(`Unrecognized term "${clause}" at position ${position} in "${expression}"`, expression, clause, position);
}

function parseLiteral(digits: string, clause: string, expression: string, position: number): number {
    const value = Number(digits);
    if (!Number.isSafeInteger(value)) {
        throw new OverflowError(`Number ${digits} in "${clause}" is too large`, expression, clause, position);
    }
    return value;
}

function checkLimits(terms: Term[], expression: string, maxDice: number): void {
    let dice = 0;
    let magnitude = 0;

    for (const term of terms) {
        if (term.kind === 'dice') {
            dice += term.count;
            magnitude += term.count * term.sides;
        } else {
            magnitude += term.value;
        }
    }

    if (dice > maxDice) {
        throw new OverflowError(`Expression rolls ${dice} dice, more than the limit of ${maxDice}`, expression);
    }
    if (magnitude > Number.MAX_SAFE_INTEGER) {
        throw new OverflowError(`Expression total could exceed ${Number.MAX_SAFE_INTEGER}`, expression);
    }
}

export function formatTerm(term: Term): string {
    if (term.kind === 'dice') {
        return `${term.sign < 0 ? '-' : ''}${term.count}d${term.sides}`;
    }
    return `${term.sign < 0 ? '-' : '+'}${term.value}`;
}

/**
 * Canonical text of a term sequence: "-2d6+1d4-3". The inverse of
 * parseExpression up to whitespace and the case of `d`.
 */
export function formatExpression(terms: readonly Term[]): string {
    return terms
        .map((term, i) => (i > 0 && term.kind === 'dice' && term.sign > 0 ? '+' : '') + formatTerm(term))
        .join('');
}

// Lowest and highest totals the terms can produce
export function expressionBounds(terms: readonly Term[]): ExpressionBounds {
    let min = 0;
    let max = 0;

    for (const term of terms) {
        if (term.kind === 'modifier') {
            min += term.sign * term.value;
            max += term.sign * term.value;
        } else if (term.sign > 0) {
            min += term.count;
            max += term.count * term.sides;
        } else {
            min -= term.count * term.sides;
            max -= term.count;
        }
    }

    return { min, max };
}
