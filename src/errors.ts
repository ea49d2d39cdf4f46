/**
 * Error types for stageline
 *
 * Fatal conditions are thrown as classes below. Conditions a stage can
 * survive (tool loop limit, tool failures, truncation) are recorded as
 * StageIssue records on the stage result instead; see pipeline/types.ts.
 */

/**
 * Base error class for stageline errors
 */
export class StagelineError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'StagelineError';
        // Maintains proper stack trace for where our error was thrown (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/**
 * Error thrown when an API key is missing or invalid
 */
export class ApiKeyError extends StagelineError {
    public readonly keyName: string;
    public readonly helpUrl?: string;

    constructor(keyName: string, message?: string, helpUrl?: string) {
        const defaultMessage = `${keyName} is not set or invalid.\n` +
            `Run: stageline init\n` +
            (helpUrl ? `Get your key at: ${helpUrl}` : '');
        super(message || defaultMessage);
        this.name = 'ApiKeyError';
        this.keyName = keyName;
        this.helpUrl = helpUrl;
    }
}

/**
 * Error thrown when configuration is invalid or incomplete
 */
export class ConfigError extends StagelineError {
    public readonly configKey?: string;

    constructor(message: string, configKey?: string) {
        super(message);
        this.name = 'ConfigError';
        this.configKey = configKey;
    }
}

/**
 * Network, auth or rate-limit failure talking to the model endpoint.
 * `retryable` is false for client errors other than 408 and 429.
 */
export class ModelEndpointError extends StagelineError {
    public readonly status?: number;
    public readonly retryable: boolean;

    constructor(message: string, options: { status?: number; retryable?: boolean } = {}) {
        super(message);
        this.name = 'ModelEndpointError';
        this.status = options.status;
        this.retryable = options.retryable ?? isRetryableStatus(options.status);
    }
}

export function isRetryableStatus(status: number | undefined): boolean {
    if (status === undefined) return true;
    if (status === 408 || status === 429) return true;
    return status >= 500;
}

export class ToolInvocationError extends StagelineError {
    public readonly toolName: string;

    constructor(toolName: string, message: string) {
        super(message);
        this.name = 'ToolInvocationError';
        this.toolName = toolName;
    }
}

/**
 * Tool arguments did not match the tool's declared input schema
 */
export class ToolArgumentsError extends ToolInvocationError {
    public readonly problems: string[];

    constructor(toolName: string, problems: string[]) {
        super(toolName, `Invalid arguments for ${toolName}: ${problems.join('; ')}`);
        this.name = 'ToolArgumentsError';
        this.problems = problems;
    }
}

/**
 * A stage's model call failed for good. Recorded on the stage result, not
 * thrown past the stage executor.
 */
export class StageExecutionError extends StagelineError {
    public readonly stageName: string;
    public readonly attempts: number;

    constructor(stageName: string, message: string, attempts = 1) {
        super(message);
        this.name = 'StageExecutionError';
        this.stageName = stageName;
        this.attempts = attempts;
    }
}

/**
 * The earliest stage failed with nothing usable, so no later stage can run
 */
export class PipelineFailedError extends StagelineError {
    constructor(message: string) {
        super(message);
        this.name = 'PipelineFailedError';
    }
}

export class RunCancelledError extends StagelineError {
    constructor(message = 'Run cancelled') {
        super(message);
        this.name = 'RunCancelledError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function describeError(error: unknown): string {
    const err = toError(error);
    return err.message || err.name;
}
