import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type AgentConfig, type LogLevel } from '../types/index.js';
import { getLogger } from './logger.js';
import { getDefaultPromptsDir, getDefaultWorkingDir } from './paths.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * CLI flags and file config may set any subset of the nested objects.
 */
export type AgentConfigOverrides = Partial<Omit<AgentConfig, 'models' | 'toolServer' | 'tracing'>> & {
    models?: Partial<AgentConfig['models']>;
    toolServer?: Partial<AgentConfig['toolServer']>;
    tracing?: Partial<AgentConfig['tracing']>;
};

/**
 * Load configuration from wikisearch.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<AgentConfigOverrides | null> {
    const explorer = cosmiconfig('wikisearch', {
        searchPlaces: ['wikisearch.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as AgentConfigOverrides;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): AgentConfigOverrides {
    const overrides: AgentConfigOverrides = {};

    const logLevel = env['WIKISEARCH_LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
        overrides.logLevel = logLevel;
    }

    const workDir = env['WIKISEARCH_WORK_DIR'];
    if (workDir) {
        overrides.workDir = workDir;
    }

    const command = env['WIKISEARCH_MCP_COMMAND'];
    if (command) {
        overrides.toolServer = { command };
    }

    // API keys are read through the secrets provider, never stored in config

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: AgentConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<AgentConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    const merged: AgentConfig = {
        ...DEFAULT_CONFIG,
        workDir: getDefaultWorkingDir(),
        promptsDir: getDefaultPromptsDir(),
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        models: {
            ...DEFAULT_CONFIG.models,
            ...fileConfig?.models,
            ...envConfig.models,
            ...cliFlags.models,
        },
        toolServer: {
            ...DEFAULT_CONFIG.toolServer,
            ...fileConfig?.toolServer,
            ...envConfig.toolServer,
            ...cliFlags.toolServer,
        },
        tracing: {
            ...DEFAULT_CONFIG.tracing,
            ...fileConfig?.tracing,
            ...envConfig.tracing,
            ...cliFlags.tracing,
        },
    };

    return merged;
}
