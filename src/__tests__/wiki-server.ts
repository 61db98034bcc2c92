import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { z } from 'zod';
import type { TransportFactory } from '../tools/tool-session.js';
import { ARTICLE_TEXT } from './fixtures.js';

export const PORTRAIT_METADATA = '{"width":1,"height":2}';

/**
 * A small Wikipedia-like tool server: one article, one portrait.
 */
export function createWikiServer(): McpServer {
    const server = new McpServer({ name: 'wiki-test', version: '1.0.0' });

    server.tool('get_article', 'Fetch a Wikipedia article', { title: z.string() }, async ({ title }) => {
        const found = title === 'Ada Lovelace';
        return {
            content: [{ type: 'text', text: found ? ARTICLE_TEXT : `No article named ${title}` }],
            isError: !found,
        };
    });

    server.tool('get_portrait', { title: z.string() }, async () => ({
        content: [
            { type: 'image', data: 'aGVsbG8=', mimeType: 'image/png' },
            { type: 'text', text: PORTRAIT_METADATA },
        ],
    }));

    return server;
}

/**
 * Connect the server to one end of an in-memory pair and hand out the other.
 */
export async function linkWikiServer(server: McpServer = createWikiServer()) {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const createTransport: TransportFactory = () => clientTransport;
    return { server, clientTransport, serverTransport, createTransport };
}
