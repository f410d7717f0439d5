import { Term } from './schemas.js';
import { RandomSource, SourceFactory } from './random.js';
import { Roll, RollOutcome } from './roll.js';
import { formatExpression } from './parser.js';

// 0 - n keeps a zero subtotal from becoming -0
function applySign(sign: number, n: number): number {
    return sign < 0 ? 0 - n : n;
}

function evaluateTerm(term: Term, source: RandomSource): RollOutcome {
    if (term.kind === 'modifier') {
        return { term, values: [term.value], subtotal: applySign(term.sign, term.value) };
    }

    const values: number[] = [];
    for (let i = 0; i < term.count; i++) {
        values.push(source.int(1, term.sides));
    }
    const sum = values.reduce((acc, val) => acc + val, 0);

    return { term, values, subtotal: applySign(term.sign, sum) };
}

/**
 * Roll every die term and add up the signed contributions. Terms are assumed
 * to have come through parseExpression or validateTerms, so this never throws.
 *
 * Given a factory, each evaluation (rerolls included) draws from a source of
 * its own and the Roll carries that source's seed. A shared source is left
 * mid-stream after every roll, so its seed would not replay anything and is
 * not reported.
 */
export function evaluateTerms(terms: readonly Term[], sources: RandomSource | SourceFactory, expression: string = formatExpression(terms)): Roll {
    const source = typeof sources === 'function' ? sources() : sources;
    const outcomes = terms.map(term => evaluateTerm(term, source));
    const total = outcomes.reduce((acc, outcome) => acc + outcome.subtotal, 0);
    const seed = typeof sources === 'function' ? source.seed : undefined;

    return new Roll(
        { expression, terms, outcomes, total, seed },
        () => evaluateTerms(terms, sources, expression)
    );
}
