/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * How to launch the Wikipedia MCP tool server.
 */
export interface ToolServerConfig {
    /** Server name reported in logs and used by the MCP tool adapter */
    name: string;
    /** Executable to spawn */
    command: string;
    args: string[];
    /** Working directory of the server process (defaults to the OS temp dir) */
    cwd?: string;
    /** Handshake timeout in milliseconds */
    connectTimeoutMs: number;
}

/**
 * Chat models used by the two graph nodes.
 */
export interface ModelConfig {
    /** Tool-using model behind the entity researcher */
    researcher: string;
    /** Tool-less model behind the name locator */
    locator: string;
}

/**
 * LangSmith tracing configuration. Only takes effect when a tracing key is available.
 */
export interface TracingConfig {
    enabled: boolean;
    project: string;
}

/**
 * Full agent configuration merged from CLI flags, env vars, and config file.
 */
export interface AgentConfig {
    // Locations
    workDir: string;
    promptsDir: string;

    // Agent
    stepBudget: number;
    models: ModelConfig;
    toolServer: ToolServerConfig;
    tracing: TracingConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
    fileLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<AgentConfig, 'workDir' | 'promptsDir'> = {
    stepBudget: 20,
    models: {
        researcher: 'gpt-5-mini',
        locator: 'gpt-5-nano',
    },
    toolServer: {
        name: 'wikipedia',
        command: 'wikipedia-mcp',
        args: ['--enable-cache'],
        connectTimeoutMs: 30000,
    },
    tracing: {
        enabled: true,
        project: 'wikisearch',
    },
    logLevel: 'info',
    jsonLogs: false,
    fileLogs: true,
};
