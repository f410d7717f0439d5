import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { DiceEngine } from '../math/dice.js';
import { AuditLogger } from './audit.js';
import { ServerConfig } from './config.js';
import { createLogger } from './logger.js';
import { DiceRangeArgs, DiceRollArgs, DiceTools, DiceToolContext, handleDiceRange, handleDiceRoll } from './dice-tools.js';

export const SERVER_NAME = 'dice-expr';
export const SERVER_VERSION = '1.0.0';

export interface DiceServer {
    server: McpServer;
    auditLogger: AuditLogger;
}

/**
 * Build the MCP server with every dice tool registered. The caller connects
 * a transport.
 */
export function createServer(config: ServerConfig): DiceServer {
    const server = new McpServer({
        name: SERVER_NAME,
        version: SERVER_VERSION
    });

    const ctx: DiceToolContext = {
        engine: new DiceEngine(config.seed, { maxDice: config.maxDice }),
        maxDice: config.maxDice
    };

    const auditLogger = new AuditLogger(createLogger('Audit', config.logLevel));

    server.tool(
        DiceTools.DICE_ROLL.name,
        DiceTools.DICE_ROLL.description,
        DiceTools.DICE_ROLL.inputSchema.shape,
        auditLogger.wrapHandler(DiceTools.DICE_ROLL.name, (args: DiceRollArgs) => handleDiceRoll(args, ctx))
    );

    server.tool(
        DiceTools.DICE_RANGE.name,
        DiceTools.DICE_RANGE.description,
        DiceTools.DICE_RANGE.inputSchema.shape,
        auditLogger.wrapHandler(DiceTools.DICE_RANGE.name, (args: DiceRangeArgs) => handleDiceRange(args, ctx))
    );

    return { server, auditLogger };
}
