import { ToolSessionError } from '../utils/errors.js';
import type { ToolArguments, ToolCaller, ToolCapability, ToolDefinition, ToolOutput } from '../types/index.js';

/**
 * Wrap a tool definition and a caller into a capability.
 */
export function createToolCapability(definition: ToolDefinition, call: ToolCaller): ToolCapability {
    return {
        name: definition.name,
        description: definition.description,
        inputSchema: definition.inputSchema,
        invoke: (args: ToolArguments): Promise<ToolOutput> => call(definition.name, args),
    };
}

/**
 * Typed lookup from tool name to capability. Names are case-insensitive.
 */
export class ToolRegistry {
    private readonly tools = new Map<string, ToolCapability>();

    constructor(capabilities: Iterable<ToolCapability> = []) {
        for (const capability of capabilities) {
            this.register(capability);
        }
    }

    /**
     * Build a registry from the tools a session advertises.
     */
    static async fromSession(session: {
        listTools(): Promise<ToolDefinition[]>;
        callTool: ToolCaller;
    }): Promise<ToolRegistry> {
        const definitions = await session.listTools();
        return new ToolRegistry(
            definitions.map((d) => createToolCapability(d, (name, args) => session.callTool(name, args)))
        );
    }

    register(capability: ToolCapability): void {
        const key = capability.name.toLowerCase();
        if (this.tools.has(key)) {
            throw new ToolSessionError(`Duplicate tool name: ${capability.name}`);
        }
        this.tools.set(key, capability);
    }

    get(name: string): ToolCapability | undefined {
        return this.tools.get(name.toLowerCase());
    }

    has(name: string): boolean {
        return this.tools.has(name.toLowerCase());
    }

    /**
     * All capabilities, in registration order.
     */
    list(): ToolCapability[] {
        return [...this.tools.values()];
    }

    get size(): number {
        return this.tools.size;
    }
}
