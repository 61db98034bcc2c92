import { readdirSync } from 'node:fs';
import { createInterface } from 'node:readline/promises';
import type { ToolArguments, ToolOutput } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { getLogger } from '../utils/logger.js';

export const SHELL_PROMPT = 'wsh> ';
export const SHELL_INTRO = 'Welcome to the Wikipedia MCP shell. Type help or ? to list commands.';

/**
 * Where the shell writes. `process.stdout` satisfies it.
 */
export interface ShellOutput {
    write(chunk: string): unknown;
}

type BuiltinCommand = 'help' | '?' | 'quit' | 'exit' | 'EOF' | 'ls';

/** Returns true to stop the loop. */
type CommandHandler = (arg: string) => Promise<boolean>;

const BUILTIN_HELP: ReadonlyArray<[string, string]> = [
    ['help [tool]', 'Show this help message, or a tool\'s arguments'],
    ['ls', 'List files in the current directory'],
    ['quit', 'Exit the shell'],
];

/**
 * Interactive shell over the tools in a registry.
 *
 * A line is either a built-in command or `<tool-name> <json-arguments>`.
 * Every command is awaited before the next line is read.
 */
export class ToolShell {
    private readonly builtins: Record<BuiltinCommand, CommandHandler>;
    private readonly cwd: string;

    constructor(
        private readonly registry: ToolRegistry,
        private readonly output: ShellOutput,
        options: { cwd?: string } = {}
    ) {
        this.cwd = options.cwd ?? process.cwd();
        const stop: CommandHandler = async () => true;
        const help: CommandHandler = async (arg) => {
            this.help(arg);
            return false;
        };
        this.builtins = {
            help,
            '?': help,
            quit: stop,
            exit: stop,
            EOF: stop,
            ls: async () => {
                this.ls();
                return false;
            },
        };
    }

    private print(line = ''): void {
        this.output.write(`${line}\n`);
    }

    private isBuiltin(command: string): command is BuiltinCommand {
        return Object.prototype.hasOwnProperty.call(this.builtins, command);
    }

    /**
     * Run one command line. Returns true when the shell should stop.
     */
    async dispatch(line: string): Promise<boolean> {
        const trimmed = line.trim();
        if (!trimmed) return false;

        // `?name` is shorthand for `help name`
        const expanded = trimmed.startsWith('?') ? `? ${trimmed.slice(1)}` : trimmed;
        const space = expanded.search(/\s/);
        const command = space === -1 ? expanded : expanded.slice(0, space);
        const arg = space === -1 ? '' : expanded.slice(space + 1).trim();

        if (this.isBuiltin(command)) {
            return this.builtins[command](arg);
        }

        await this.runTool(command.toLowerCase(), arg);
        return false;
    }

    printTools(): void {
        this.print('Available commands:');
        for (const tool of this.registry.list()) {
            this.print(`  ${tool.name}: ${tool.description}`);
        }
        this.print();
    }

    private help(arg: string): void {
        if (!arg) {
            this.print('Available commands:');
            for (const [name, description] of BUILTIN_HELP) {
                this.print(`  ${name}: ${description}`);
            }
            for (const tool of this.registry.list()) {
                this.print(`  ${tool.name}: ${tool.description}`);
            }
            return;
        }

        const tool = this.registry.get(arg);
        if (!tool) {
            this.print(`No help available for: ${arg}`);
            return;
        }
        this.print(`${tool.name}:`);
        this.print(`Description: ${tool.description}`);
        this.print('Arguments:');
        this.print(JSON.stringify(tool.inputSchema, null, 2));
    }

    private ls(): void {
        const entries = readdirSync(this.cwd).sort();
        this.print(entries.join('  '));
    }

    private async runTool(name: string, argText: string): Promise<void> {
        const tool = this.registry.get(name);
        if (!tool) {
            this.print(`Unknown command: ${name}`);
            return;
        }

        const args = parseArguments(argText);
        if (args === null) {
            this.print('Error: Arguments must be a valid JSON object');
            return;
        }

        this.print(`Entering ${tool.name} => ${tool.description}`);
        try {
            const result = await tool.invoke(args);
            this.print(`Completed tool ${tool.name}`);
            this.print(formatToolOutput(result));
        } catch (error) {
            getLogger().error({ err: error, tool: tool.name }, 'Tool invocation failed');
            this.print(`Error executing ${tool.name}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    /**
     * Read lines from `input` until EOF or a stop command.
     */
    async run(input: NodeJS.ReadableStream): Promise<void> {
        const rl = createInterface({ input, terminal: false });
        this.print(SHELL_INTRO);
        this.printTools();
        this.output.write(SHELL_PROMPT);

        try {
            for await (const line of rl) {
                if (await this.dispatch(line)) return;
                this.output.write(SHELL_PROMPT);
            }
            this.print();
        } finally {
            rl.close();
        }
    }
}

/**
 * Parse the argument part of a tool command. Empty text means no arguments.
 * Returns null unless the text is a JSON object.
 */
export function parseArguments(text: string): ToolArguments | null {
    if (!text) return {};

    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch {
        return null;
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return null;
    }
    return Object.fromEntries(Object.entries(value));
}

/**
 * Render a tool result for the terminal. JSON text blocks are pretty-printed.
 */
export function formatToolOutput(output: ToolOutput): string {
    const parts = output.content.map((block) => {
        if (block.text === undefined) return `[${block.type}]`;
        try {
            return JSON.stringify(JSON.parse(block.text), null, 2);
        } catch {
            return block.text;
        }
    });
    const body = parts.join('\n');
    return output.isError ? `Tool reported an error:\n${body}` : body;
}
