import { tmpdir } from 'node:os';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { loadMcpTools } from '@langchain/mcp-adapters';
import type { StructuredToolInterface } from '@langchain/core/tools';
import type { ToolArguments, ToolContentBlock, ToolDefinition, ToolOutput, ToolServerConfig } from '../types/index.js';
import { ToolSessionError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const CLIENT_INFO = { name: 'wikisearch-agent', version: '0.1.0' };

/**
 * Creates the transport a session talks over.
 */
export type TransportFactory = (config: ToolServerConfig, serverEnv: Record<string, string>) => Transport;

export interface ToolSessionOptions {
    /** Defaults to spawning `config.command` over stdio */
    createTransport?: TransportFactory;
}

export const stdioTransport: TransportFactory = (config, serverEnv) =>
    new StdioClientTransport({
        command: config.command,
        args: config.args,
        cwd: config.cwd ?? tmpdir(),
        env: { ...getDefaultEnvironment(), ...serverEnv },
    });

/**
 * A connection to one MCP tool server, by default a subprocess over stdio.
 *
 * Lifecycle: `connect()` spawns the server and performs the handshake,
 * `close()` tears both down. Use `withToolSession()` to scope it.
 */
export class ToolSession {
    private client: Client | null = null;
    private transport: Transport | null = null;
    private readonly createTransport: TransportFactory;

    constructor(
        private readonly config: ToolServerConfig,
        private readonly serverEnv: Record<string, string> = {},
        options: ToolSessionOptions = {}
    ) {
        this.createTransport = options.createTransport ?? stdioTransport;
    }

    /**
     * Spawn the server and perform the MCP handshake.
     */
    async connect(): Promise<void> {
        if (this.client) return;

        const logger = getLogger();
        const client = new Client(CLIENT_INFO, { capabilities: {} });
        const transport = this.createTransport(this.config, this.serverEnv);

        logger.debug(
            { server: this.config.name, command: this.config.command, args: this.config.args },
            'Starting tool server'
        );

        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(
                () => reject(new Error(`Handshake timed out after ${this.config.connectTimeoutMs}ms`)),
                this.config.connectTimeoutMs
            );
        });

        try {
            await Promise.race([client.connect(transport), timeout]);
        } catch (error) {
            await transport.close().catch((closeError: unknown) => {
                logger.debug({ err: closeError }, 'Error closing failed transport');
            });
            throw new ToolSessionError(
                `Failed to connect to tool server ${this.config.name} (${this.config.command})`,
                { cause: error }
            );
        } finally {
            clearTimeout(timer);
        }

        this.client = client;
        this.transport = transport;
        logger.debug({ server: this.config.name }, 'Tool session initialized');
    }

    private requireClient(): Client {
        if (!this.client) {
            throw new ToolSessionError(`Tool session ${this.config.name} is not connected`);
        }
        return this.client;
    }

    /**
     * List the tools the server advertises.
     */
    async listTools(): Promise<ToolDefinition[]> {
        const client = this.requireClient();
        try {
            const response = await client.listTools();
            return response.tools.map((tool) => ({
                name: tool.name,
                description: tool.description ?? '',
                inputSchema: tool.inputSchema,
            }));
        } catch (error) {
            throw new ToolSessionError(`Failed to list tools on ${this.config.name}`, { cause: error });
        }
    }

    /**
     * Invoke a tool by name. Tool-level failures come back with `isError` set;
     * protocol failures throw.
     */
    async callTool(name: string, args: ToolArguments): Promise<ToolOutput> {
        const client = this.requireClient();
        let result: CallToolResult;
        try {
            result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
        } catch (error) {
            throw new ToolSessionError(`Failed to call tool ${name} on ${this.config.name}`, { cause: error });
        }

        return {
            content: result.content.map((block): ToolContentBlock =>
                block.type === 'text' ? { type: 'text', text: block.text } : { type: block.type }
            ),
            isError: result.isError ?? false,
        };
    }

    /**
     * The server's tools as LangChain tools, for the research agent.
     */
    async loadAgentTools(): Promise<StructuredToolInterface[]> {
        const client = this.requireClient();
        try {
            return await loadMcpTools(this.config.name, client, {
                throwOnLoadError: true,
                prefixToolNameWithServerName: false,
                additionalToolNamePrefix: '',
            });
        } catch (error) {
            throw new ToolSessionError(`Failed to load tools from ${this.config.name}`, { cause: error });
        }
    }

    /**
     * Close the transport, which also stops the server process.
     */
    async close(): Promise<void> {
        const transport = this.transport;
        this.client = null;
        this.transport = null;
        if (transport) {
            await transport.close();
            getLogger().debug({ server: this.config.name }, 'Tool session closed');
        }
    }
}

/**
 * Open a tool session, run `fn` with it, and always close it afterwards.
 */
export async function withToolSession<T>(
    config: ToolServerConfig,
    serverEnv: Record<string, string>,
    fn: (session: ToolSession) => Promise<T>,
    options: ToolSessionOptions = {}
): Promise<T> {
    const session = new ToolSession(config, serverEnv, options);
    await session.connect();
    try {
        return await fn(session);
    } finally {
        await session.close();
    }
}
