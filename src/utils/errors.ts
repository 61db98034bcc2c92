import type { ZodIssue } from 'zod';

export type WikisearchErrorCode =
    | 'MISSING_CREDENTIAL'
    | 'TOOL_SESSION'
    | 'STRUCTURED_OUTPUT'
    | 'STEP_BUDGET_EXCEEDED'
    | 'NODE_ORDER'
    | 'INVALID_STATE'
    | 'PROMPT_FILE';

/**
 * Base class for every error the agent raises itself.
 * None of them are retried; they propagate to the CLI, which exits non-zero.
 */
export class WikisearchError extends Error {
    constructor(
        message: string,
        public readonly code: WikisearchErrorCode,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'WikisearchError';
    }
}

/**
 * A required credential was not found. Raised before any network activity.
 */
export class MissingCredentialError extends WikisearchError {
    constructor(public readonly secret: string) {
        super(`Missing required credential: ${secret}`, 'MISSING_CREDENTIAL');
        this.name = 'MissingCredentialError';
    }
}

/**
 * The tool server could not be started, handshaken with, or queried.
 */
export class ToolSessionError extends WikisearchError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'TOOL_SESSION', options);
        this.name = 'ToolSessionError';
    }
}

/**
 * A model response did not match the requested record shape.
 */
export class StructuredOutputError extends WikisearchError {
    constructor(
        public readonly schemaName: string,
        public readonly issues: ZodIssue[],
        options?: { cause?: unknown }
    ) {
        const detail = issues.length > 0
            ? issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ')
            : 'no structured response';
        super(`Model output is not a valid ${schemaName}: ${detail}`, 'STRUCTURED_OUTPUT', options);
        this.name = 'StructuredOutputError';
    }
}

/**
 * The tool-using agent ran out of steps before producing an answer.
 */
export class StepBudgetExceededError extends WikisearchError {
    constructor(public readonly budget: number, options?: { cause?: unknown }) {
        super(`Agent did not finish within its step budget of ${budget}`, 'STEP_BUDGET_EXCEEDED', options);
        this.name = 'StepBudgetExceededError';
    }
}

/**
 * A graph node ran before the node whose output it depends on.
 */
export class NodeOrderError extends WikisearchError {
    constructor(
        public readonly node: string,
        public readonly missing: string
    ) {
        super(`${node} requires ${missing}, which has not been produced yet`, 'NODE_ORDER');
        this.name = 'NodeOrderError';
    }
}

/**
 * The graph state is missing a required input.
 */
export class InvalidStateError extends WikisearchError {
    constructor(message: string) {
        super(message, 'INVALID_STATE');
        this.name = 'InvalidStateError';
    }
}

/**
 * A prompt template file could not be read or has the wrong shape.
 */
export class PromptFileError extends WikisearchError {
    constructor(
        public readonly source: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(`${source}: ${message}`, 'PROMPT_FILE', options);
        this.name = 'PromptFileError';
    }
}
