import { z } from 'zod';

export const SignSchema = z.union([z.literal(1), z.literal(-1)]);

export type Sign = z.infer<typeof SignSchema>;

// A die-roll term: NdM, sign applied to the summed dice
export const DieRollTermSchema = z.object({
    kind: z.literal('dice'),
    count: z.number().int().min(1),
    sides: z.number().int().min(1),
    sign: SignSchema
});

export type DieRollTerm = z.infer<typeof DieRollTermSchema>;

// A flat modifier: the literal is never negative, the sign carries direction
export const ModifierTermSchema = z.object({
    kind: z.literal('modifier'),
    value: z.number().int().min(0),
    sign: SignSchema
});

export type ModifierTerm = z.infer<typeof ModifierTermSchema>;

export const TermSchema = z.discriminatedUnion('kind', [DieRollTermSchema, ModifierTermSchema]);

export type Term = z.infer<typeof TermSchema>;

export const TermOutcomeSchema = z.object({
    term: TermSchema,
    values: z.array(z.number().int()),
    subtotal: z.number().int()
});

export type TermOutcome = z.infer<typeof TermOutcomeSchema>;

export const CalculationResultSchema = z.object({
    input: z.string(),
    result: z.number().int(),
    steps: z.array(z.string()).default([]),
    timestamp: z.string().datetime(),
    seed: z.string().optional(),
    metadata: z.object({
        breakdown: z.string(),
        outcomes: z.array(TermOutcomeSchema)
    })
});

export type CalculationResult = z.infer<typeof CalculationResultSchema>;

export const ExportFormatSchema = z.enum(['plaintext', 'breakdown', 'steps', 'json']);

export type ExportFormat = z.infer<typeof ExportFormatSchema>;
