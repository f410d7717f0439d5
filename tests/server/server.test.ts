import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createServer, DiceServer } from '../../src/server/server.js';

const ToolResultSchema = z.object({
    isError: z.boolean().optional(),
    content: z.array(z.object({ type: z.literal('text'), text: z.string() }))
});

function texts(result: unknown): string[] {
    return ToolResultSchema.parse(result).content.map(block => block.text);
}

describe('Dice MCP server', () => {
    let dice: DiceServer;
    let client: Client;

    beforeEach(async () => {
        dice = createServer({ seed: 'server-seed', maxDice: 100, logLevel: 'silent' });
        client = new Client({ name: 'test-client', version: '1.0.0' });

        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        await Promise.all([
            client.connect(clientTransport),
            dice.server.connect(serverTransport)
        ]);
    });

    afterEach(async () => {
        await client.close();
        await dice.server.close();
    });

    it('should list the dice tools', async () => {
        const { tools } = await client.listTools();
        expect(tools.map(tool => tool.name).sort()).toEqual(['dice_range', 'dice_roll']);
    });

    it('should roll through the tool call', async () => {
        const result = await client.callTool({
            name: 'dice_roll',
            arguments: { expression: '2d1 + 2', exportFormat: 'plaintext' }
        });

        expect(texts(result)).toEqual(['4']);
    });

    it('should roll a range through the tool call', async () => {
        const result = await client.callTool({ name: 'dice_range', arguments: { low: 4, high: 4 } });
        expect(texts(result)).toEqual(['4']);
    });

    it('should return an error result for a bad expression', async () => {
        const result = ToolResultSchema.parse(await client.callTool({
            name: 'dice_roll',
            arguments: { expression: '3d6+' }
        }));

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('ParseError: Missing term at position 4 in "3d6+"');
    });

    it('should enforce the configured dice limit', async () => {
        const result = ToolResultSchema.parse(await client.callTool({
            name: 'dice_roll',
            arguments: { expression: '101d6' }
        }));

        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('OverflowError: Expression rolls 101 dice, more than the limit of 100');
    });

    it('should audit every call', async () => {
        await client.callTool({ name: 'dice_roll', arguments: { expression: '1d1' } });
        await client.callTool({ name: 'dice_range', arguments: { low: 1, high: 1 } });

        expect(dice.auditLogger.list().map(entry => entry.action)).toEqual(['dice_roll', 'dice_range']);
    });
});
