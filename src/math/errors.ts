/**
 * Base class for every error the dice library raises. Callers that only care
 * whether an input was rejected can catch this one type.
 */
export class DiceError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * The expression does not follow the `NdM` / integer term grammar.
 */
export class ParseError extends DiceError {
    readonly expression: string;
    readonly clause?: string;
    readonly position?: number;

    constructor(message: string, expression: string, clause?: string, position?: number) {
        super(message);
        this.expression = expression;
        this.clause = clause;
        this.position = position;
    }
}

/**
 * The expression is well formed but its totals could not be represented
 * exactly, or it asks for more dice than the engine allows.
 */
export class OverflowError extends ParseError {}

export class InvalidRangeError extends DiceError {
    readonly low: number;
    readonly high: number;

    constructor(low: number, high: number, reason?: string) {
        super(reason ?? `Invalid range: low (${low}) is greater than high (${high})`);
        this.low = low;
        this.high = high;
    }
}
