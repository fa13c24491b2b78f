export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/**
 * Raised before a job exists (bad upload, unsupported extension, empty name).
 */
export class ValidationError extends PipelineError {
    readonly code: string;

    constructor(message: string, code = 'validation_failed', options?: ErrorOptions) {
        super(message, options);
        this.code = code;
    }
}

export interface ToolFailureDetails {
    exitCode?: number | null;
    /** Last lines the tool wrote to its diagnostic stream. */
    diagnostics?: string[];
}

export class ToolStageError extends PipelineError {
    readonly exitCode: number | null;
    readonly diagnostics: string[];

    constructor(message: string, details: ToolFailureDetails = {}, options?: ErrorOptions) {
        super(message, options);
        this.exitCode = details.exitCode ?? null;
        this.diagnostics = details.diagnostics ?? [];
    }
}

/** Stage 1 failure: tool missing, non-zero exit, unreadable source, no output. */
export class TranscodeError extends ToolStageError {
    constructor(message: string, details: ToolFailureDetails = {}, options?: ErrorOptions) {
        super(message, details, options);
    }
}

/** Stage 2 failure: model/runtime failure, accelerator exhaustion, transcript write. */
export class TranscriptionError extends ToolStageError {
    constructor(message: string, details: ToolFailureDetails = {}, options?: ErrorOptions) {
        super(message, details, options);
    }
}

export class InternalError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class QueueClosedError extends PipelineError {
    constructor(message = 'Job queue is shut down and no longer accepts submissions', options?: ErrorOptions) {
        super(message, options);
    }
}
