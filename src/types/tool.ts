/**
 * JSON arguments passed to a tool.
 */
export type ToolArguments = Record<string, unknown>;

/**
 * A tool as advertised by the tool server.
 */
export interface ToolDefinition {
    name: string;
    description: string;
    /** JSON schema of the tool's arguments */
    inputSchema: Record<string, unknown>;
}

/**
 * One block of a tool result. Non-text blocks keep only their type.
 */
export interface ToolContentBlock {
    type: string;
    text?: string;
}

/**
 * Result of a tool invocation.
 */
export interface ToolOutput {
    content: ToolContentBlock[];
    isError: boolean;
}

/**
 * Invokes a tool on the server by name.
 */
export type ToolCaller = (name: string, args: ToolArguments) => Promise<ToolOutput>;

/**
 * A callable tool with a fixed invoke signature. The shell and the registry
 * only ever talk to tools through this interface.
 */
export interface ToolCapability {
    readonly name: string;
    readonly description: string;
    readonly inputSchema: Record<string, unknown>;
    invoke(args: ToolArguments): Promise<ToolOutput>;
}
