import { Term } from './schemas.js';
import { RandomSource, SourceFactory, seededSources } from './random.js';
import { DEFAULT_MAX_DICE, ExpressionBounds, ParseOptions, expressionBounds, normalizeExpression, parseExpression, validateTerms } from './parser.js';
import { evaluateTerms } from './evaluator.js';
import { rollRangeFrom } from './range.js';
import { DiceError } from './errors.js';
import { Roll } from './roll.js';
import { randomUUID } from 'crypto';

export type DiceEngineOptions = ParseOptions;

export type SafeRollResult =
    | { success: true; roll: Roll }
    | { success: false; error: DiceError };

/**
 * Binds a random source and parse limits.
 *
 * With a seed string (or nothing, for a random one) every roll gets its own
 * SeededRandom and reports its seed: `new DiceEngine(roll.seed).roll(expr)`
 * replays it. A RandomSource is shared by every draw; a SourceFactory is asked
 * for a source per roll.
 */
export class DiceEngine {
    private sources: RandomSource | SourceFactory;
    private baseSeed?: string;
    private maxDice: number;

    constructor(seedOrSource?: string | RandomSource | SourceFactory, options: DiceEngineOptions = {}) {
        if (typeof seedOrSource === 'object' || typeof seedOrSource === 'function') {
            this.sources = seedOrSource;
        } else {
            this.baseSeed = seedOrSource ?? randomUUID();
            this.sources = seededSources(this.baseSeed);
        }
        this.maxDice = options.maxDice ?? DEFAULT_MAX_DICE;
        if (!Number.isSafeInteger(this.maxDice) || this.maxDice < 1) {
            throw new Error(`maxDice must be a positive integer, got ${this.maxDice}`);
        }
    }

    /** Seed of the first roll; later rolls report their own. */
    get seed(): string | undefined {
        return this.baseSeed ?? (typeof this.sources === 'object' ? this.sources.seed : undefined);
    }

    parse(expression: string): Term[] {
        return parseExpression(expression, { maxDice: this.maxDice });
    }

    /**
     * Roll terms built by hand. They are checked against the term schema and
     * the dice limit first, the same as parsed ones.
     */
    evaluate(terms: readonly Term[]): Roll {
        return evaluateTerms(validateTerms(terms, { maxDice: this.maxDice }), this.sources);
    }

    roll(expression: string): Roll {
        const terms = this.parse(expression);
        return evaluateTerms(terms, this.sources, normalizeExpression(expression));
    }

    safeRoll(expression: string): SafeRollResult {
        try {
            return { success: true, roll: this.roll(expression) };
        } catch (error) {
            if (error instanceof DiceError) {
                return { success: false, error };
            }
            throw error;
        }
    }

    rollRange(low: number, high: number): number {
        return rollRangeFrom(typeof this.sources === 'function' ? this.sources() : this.sources, low, high);
    }

    bounds(expression: string): ExpressionBounds {
        return expressionBounds(this.parse(expression));
    }
}

let defaultEngine: DiceEngine | undefined;

function getDefaultEngine(): DiceEngine {
    if (!defaultEngine) {
        defaultEngine = new DiceEngine();
    }
    return defaultEngine;
}

/** Parse and roll in one call, e.g. `rollDice('3d6 + 4')`. */
export function rollDice(expression: string): Roll {
    return getDefaultEngine().roll(expression);
}

export function safeRollDice(expression: string): SafeRollResult {
    return getDefaultEngine().safeRoll(expression);
}

export function rollRange(low: number, high: number): number {
    return getDefaultEngine().rollRange(low, high);
}

/**
 * First `n` items of an iterable. Bounds the endless sequence from
 * `Roll.rerolls()`, so `n` must be a whole number.
 */
export function take<T>(iterable: Iterable<T>, n: number): T[] {
    if (!Number.isSafeInteger(n) || n < 0) {
        throw new Error(`take expects a non-negative integer count, got ${n}`);
    }
    const items: T[] = [];
    if (n === 0) {
        return items;
    }
    for (const item of iterable) {
        items.push(item);
        if (items.length >= n) {
            break;
        }
    }
    return items;
}
