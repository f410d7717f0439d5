import { z } from 'zod';
import { DEFAULT_MAX_DICE } from '../math/parser.js';
import { LogLevel } from './logger.js';

export const ConfigSchema = z.object({
    DICE_SEED: z.string().min(1).optional(),
    DICE_MAX_DICE: z.coerce.number().int().positive().default(DEFAULT_MAX_DICE),
    DICE_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info']).default('info')
});

export interface ServerConfig {
    /** Fixed seed for the server's shared engine; rolls are unseeded otherwise. */
    seed?: string;
    maxDice: number;
    logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    const parsed = ConfigSchema.parse(env);
    return {
        seed: parsed.DICE_SEED,
        maxDice: parsed.DICE_MAX_DICE,
        logLevel: parsed.DICE_LOG_LEVEL
    };
}
