import { CalculationResult, CalculationResultSchema, ExportFormat } from './schemas.js';
import { formatTerm } from './parser.js';
import { Roll, RollOutcome } from './roll.js';

function describeOutcome({ term, values, subtotal }: RollOutcome): string {
    if (term.kind === 'modifier') {
        return `Modifier: ${formatTerm(term)}`;
    }
    return `Rolled ${formatTerm(term)}: [${values.join(', ')}] = ${subtotal}`;
}

export function toCalculationResult(roll: Roll, timestamp: Date = new Date()): CalculationResult {
    return CalculationResultSchema.parse({
        input: roll.expression,
        result: roll.total,
        steps: [...roll.outcomes.map(describeOutcome), `Total: ${roll.total}`],
        timestamp: timestamp.toISOString(),
        seed: roll.seed,
        metadata: {
            breakdown: roll.result,
            outcomes: roll.outcomes.map(({ term, values, subtotal }) => ({ term, values: [...values], subtotal }))
        }
    });
}

export class ExportEngine {

    export(roll: Roll, format: ExportFormat): string {
        switch (format) {
            case 'plaintext':
                return String(roll.total);
            case 'breakdown':
                return roll.toString();
            case 'steps':
                return this.toSteps(toCalculationResult(roll));
            case 'json':
                return JSON.stringify(toCalculationResult(roll), null, 2);
            default:
                throw new Error(`Unsupported export format: ${String(format)}`);
        }
    }

    private toSteps(result: CalculationResult): string {
        const header = `Input: ${result.input}\nResult: ${result.result}\n\nSteps:\n`;
        const steps = result.steps.map((s, i) => `${i + 1}. ${s}`).join('\n');
        return header + steps;
    }
}
