import { z } from 'zod';
import { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { DiceEngine, take } from '../math/dice.js';
import { ExportEngine } from '../math/export.js';
import { ExportFormatSchema } from '../math/schemas.js';
import { DiceError } from '../math/errors.js';

// Tool Definitions
export const DiceTools = {
    DICE_ROLL: {
        name: 'dice_roll',
        description: 'Roll dice using standard notation: die terms (3d6) and flat modifiers (+4) joined by + or -, e.g. "2d6 + 1d4 - 1". Set repeat to roll the same expression several times.',
        inputSchema: z.object({
            expression: z.string(),
            seed: z.string().optional(),
            repeat: z.number().int().min(1).max(100).optional().default(1),
            exportFormat: ExportFormatSchema.optional().default('breakdown')
        })
    },
    DICE_RANGE: {
        name: 'dice_range',
        description: 'Pick a uniformly random integer between low and high, both inclusive.',
        inputSchema: z.object({
            low: z.number().int(),
            high: z.number().int(),
            seed: z.string().optional()
        })
    }
};

export type DiceRollArgs = z.infer<typeof DiceTools.DICE_ROLL.inputSchema>;
export type DiceRangeArgs = z.infer<typeof DiceTools.DICE_RANGE.inputSchema>;

export interface DiceToolContext {
    /** Shared engine for calls that do not bring their own seed. */
    engine: DiceEngine;
    maxDice: number;
}

function engineFor(seed: string | undefined, ctx: DiceToolContext): DiceEngine {
    return seed ? new DiceEngine(seed, { maxDice: ctx.maxDice }) : ctx.engine;
}

function diceErrorResult(error: unknown): CallToolResult {
    if (!(error instanceof DiceError)) {
        throw error;
    }
    return {
        isError: true,
        content: [{ type: 'text', text: `${error.name}: ${error.message}` }]
    };
}

// Handlers

export async function handleDiceRoll(args: DiceRollArgs, ctx: DiceToolContext): Promise<CallToolResult> {
    const engine = engineFor(args.seed, ctx);
    const exporter = new ExportEngine();

    try {
        const first = engine.roll(args.expression);
        const rolls = [first, ...take(first.rerolls(), args.repeat - 1)];

        return {
            content: rolls.map(roll => ({
                type: 'text' as const,
                text: exporter.export(roll, args.exportFormat)
            }))
        };
    } catch (error) {
        return diceErrorResult(error);
    }
}

export async function handleDiceRange(args: DiceRangeArgs, ctx: DiceToolContext): Promise<CallToolResult> {
    const engine = engineFor(args.seed, ctx);

    try {
        const value = engine.rollRange(args.low, args.high);
        return {
            content: [{ type: 'text', text: String(value) }]
        };
    } catch (error) {
        return diceErrorResult(error);
    }
}
