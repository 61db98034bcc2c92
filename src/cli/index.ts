#!/usr/bin/env node
import { join } from 'node:path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { NameFinderApp, toolServerEnv } from '../agent/app.js';
import { ToolShell } from '../shell/tool-shell.js';
import { ToolRegistry } from '../tools/registry.js';
import { withToolSession } from '../tools/tool-session.js';
import { isLogLevel, resolveConfig, type AgentConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { EnvSecretsProvider, fetchSecrets } from '../utils/secrets.js';
import type { AgentConfig } from '../types/index.js';

const VERSION = '0.1.0';

interface CommonOptions {
    logLevel?: string;
    jsonLogs?: boolean;
    workDir?: string;
    mcpCommand?: string;
    mcpArgs?: string[];
}

/**
 * Overrides shared by every command. Only options the user actually gave are
 * set, so config file and env values are not clobbered by undefined.
 */
function commonOverrides(opts: CommonOptions): AgentConfigOverrides {
    const overrides: AgentConfigOverrides = {};
    if (opts.logLevel && isLogLevel(opts.logLevel)) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;
    if (opts.workDir) overrides.workDir = opts.workDir;
    if (opts.mcpCommand || opts.mcpArgs) {
        overrides.toolServer = {
            ...(opts.mcpCommand ? { command: opts.mcpCommand } : {}),
            ...(opts.mcpArgs ? { args: opts.mcpArgs } : {}),
        };
    }
    return overrides;
}

function parseStepBudget(value: string): number {
    const steps = parseInt(value, 10);
    if (!Number.isInteger(steps) || steps < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return steps;
}

function setupLogging(config: AgentConfig): void {
    initLogger({
        level: config.logLevel,
        jsonLogs: config.jsonLogs,
        logDir: config.fileLogs ? join(config.workDir, 'logs') : undefined,
    });
}

function addCommonOptions(command: Command): Command {
    return command
        .option('--work-dir <path>', 'Working directory for output and logs')
        .option('--mcp-command <path>', 'Wikipedia MCP server executable')
        .option('--mcp-args <args...>', 'Arguments for the MCP server')
        .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
        .option('--json-logs', 'Output JSON logs');
}

const program = new Command();

program
    .name('wikisearch')
    .description('Research a person on Wikipedia and extract biographical facts and co-occurring names.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

addCommonOptions(
    program
        .command('run')
        .description('Research a person and write agent_out.json to the working directory')
        .requiredOption('-p, --person <name>', 'Person to research')
        .option('-s, --steps <n>', 'Step budget for the research agent', parseStepBudget)
        .option('--prompts-dir <path>', 'Directory holding the prompt YAML files')
        .option('--researcher-model <model>', 'Model for the entity researcher')
        .option('--locator-model <model>', 'Model for the name locator')
        .option('--no-file-logs', 'Do not write log files to the working directory')
        .option('--no-tracing', 'Disable LangSmith tracing')
).action(async (opts) => {
    const overrides = commonOverrides(opts);
    if (opts.steps) overrides.stepBudget = opts.steps;
    if (opts.promptsDir) overrides.promptsDir = opts.promptsDir;
    if (opts.researcherModel || opts.locatorModel) {
        overrides.models = {
            ...(opts.researcherModel ? { researcher: opts.researcherModel } : {}),
            ...(opts.locatorModel ? { locator: opts.locatorModel } : {}),
        };
    }
    if (opts.fileLogs === false) overrides.fileLogs = false;
    if (opts.tracing === false) overrides.tracing = { enabled: false };

    const config = await resolveConfig(overrides);
    setupLogging(config);
    const logger = getLogger();

    try {
        const { outputPath } = await new NameFinderApp(config).run(opts.person);
        logger.info({ outputPath }, 'Run complete!');
    } catch {
        // Already logged by the app with its context
        process.exitCode = 1;
    }
});

// ─── SHELL command ────────────────────────────────────────

addCommonOptions(
    program
        .command('shell')
        .description('Interactive shell for calling the Wikipedia MCP tools by hand')
).action(async (opts) => {
    const config = await resolveConfig({ ...commonOverrides(opts), fileLogs: false });
    setupLogging(config);
    const logger = getLogger();

    try {
        const secrets = await fetchSecrets(new EnvSecretsProvider());
        await withToolSession(config.toolServer, toolServerEnv(secrets), async (session) => {
            const registry = await ToolRegistry.fromSession(session);
            await new ToolShell(registry, process.stdout).run(process.stdin);
        });
        console.log('Goodbye!');
    } catch (error) {
        logger.error({ err: error }, 'Shell failed');
        process.exitCode = 1;
    }
});

await program.parseAsync();
