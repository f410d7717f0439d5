import { Term } from './schemas.js';
import { formatTerm } from './parser.js';

export interface RollOutcome {
    readonly term: Term;
    /** Individual die faces, or the bare literal of a modifier. */
    readonly values: readonly number[];
    /** Signed contribution to the total. */
    readonly subtotal: number;
}

export interface RollData {
    expression: string;
    terms: readonly Term[];
    outcomes: readonly RollOutcome[];
    total: number;
    seed?: string;
}

/**
 * The evaluated result of one dice expression. Immutable once built.
 *
 * A Roll keeps hold of the function that produced it, so the same parsed
 * expression can be sampled again through {@link Roll.rerolls}.
 */
export class Roll {
    readonly expression: string;
    readonly terms: readonly Term[];
    readonly outcomes: readonly RollOutcome[];
    readonly total: number;
    readonly seed?: string;

    private readonly reroll: () => Roll;

    constructor(data: RollData, reroll: () => Roll) {
        this.expression = data.expression;
        this.terms = Object.freeze(data.terms.map(term => Object.freeze({ ...term })));
        this.outcomes = Object.freeze(data.outcomes.map(outcome => Object.freeze({
            term: Object.freeze({ ...outcome.term }),
            values: Object.freeze([...outcome.values]),
            subtotal: outcome.subtotal
        })));
        this.total = data.total;
        this.seed = data.seed;
        this.reroll = reroll;
        Object.freeze(this);
    }

    /**
     * Per-term breakdown in input order, e.g. `3d1[1, 1, 1]-2d1[1, 1]-4`.
     */
    get result(): string {
        return this.outcomes
            .map(({ term, values }, i) => {
                if (term.kind === 'modifier') {
                    return formatTerm(term);
                }
                const prefix = term.sign < 0 ? '-' : i > 0 ? '+' : '';
                return `${prefix}${term.count}d${term.sides}[${values.join(', ')}]`;
            })
            .join('');
    }

    /**
     * Endless sequence of fresh rolls of the same expression. Every pull draws
     * new values; bound it with `take`.
     */
    *rerolls(): Generator<Roll, never> {
        while (true) {
            yield this.reroll();
        }
    }

    toString(): string {
        return `${this.result} (Total: ${this.total})`;
    }
}
