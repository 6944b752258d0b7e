/**
 * Error types raised by the store, the tool registry and the agent loop.
 * Each sets `name` so callers can branch on it after crossing a module boundary.
 */

/** Malformed structured input, e.g. a date that is not a calendar date. */
export class ValidationError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'ValidationError';
        this.field = field;
    }
}

/** A tool's input did not match its declared schema. */
export class SchemaValidationError extends ValidationError {
    readonly toolName: string;

    constructor(toolName: string, field: string, message: string) {
        super(field, `Invalid input for tool '${toolName}': field '${field}' ${message}`);
        this.name = 'SchemaValidationError';
        this.toolName = toolName;
    }
}

/** The planner asked for a tool that does not exist or sent arguments that are not JSON. */
export class MalformedToolCallError extends Error {
    readonly toolName: string;

    constructor(toolName: string, message: string) {
        super(message);
        this.name = 'MalformedToolCallError';
        this.toolName = toolName;
    }
}

/** An external collaborator (knowledge retrieval, model provider) failed or timed out. */
export class CollaboratorUnavailableError extends Error {
    readonly collaborator: string;

    constructor(collaborator: string, message: string) {
        super(`${collaborator} unavailable: ${message}`);
        this.name = 'CollaboratorUnavailableError';
        this.collaborator = collaborator;
    }
}

/** Required process configuration is missing. Fatal at startup. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Errors the planner can recover from: they are reported back into the loop
 * as an observation instead of aborting the run.
 */
export function isRecoverableToolError(error: unknown): error is ValidationError | MalformedToolCallError {
    return error instanceof ValidationError || error instanceof MalformedToolCallError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
