export interface ErrorContext {
    /** Instruction or RPC step that failed, e.g. `initialize_voting`. */
    operation?: string;
    /** Base58 address the step was working on. */
    address?: string;
    cause?: unknown;
}

export class VotingClientError extends Error {
    readonly operation?: string;
    readonly address?: string;

    constructor(message: string, context: ErrorContext = {}) {
        super(message, context.cause === undefined ? undefined : { cause: context.cause });
        this.name = 'VotingClientError';
        this.operation = context.operation;
        this.address = context.address;
    }
}

/** Bad or missing key material / settings. Raised before any network call. */
export class ConfigurationError extends VotingClientError {
    constructor(
        message: string,
        public readonly details: string[] = [],
        context: ErrorContext = {}
    ) {
        super(message, context);
        this.name = 'ConfigurationError';
    }
}

export class NetworkError extends VotingClientError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'NetworkError';
    }
}

export class SubmissionRejectedError extends VotingClientError {
    constructor(
        public readonly reason: string,
        public readonly logs: string[] = [],
        context: ErrorContext = {}
    ) {
        super(`${context.operation ?? 'transaction'} rejected: ${reason}`, context);
        this.name = 'SubmissionRejectedError';
    }
}

/**
 * The poll budget ran out. The transaction may still land, so callers should
 * re-query `signature` instead of treating this as a failure.
 */
export class ConfirmationTimeoutError extends VotingClientError {
    constructor(
        public readonly signature: string,
        public readonly attempts: number,
        context: ErrorContext = {}
    ) {
        super(
            `${context.operation ?? 'transaction'} ${signature} not confirmed after ${attempts} attempts (outcome uncertain)`,
            context
        );
        this.name = 'ConfirmationTimeoutError';
    }
}

export class DecodeError extends VotingClientError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'DecodeError';
    }
}

export class DerivationExhaustedError extends VotingClientError {
    constructor(message: string, context: ErrorContext = {}) {
        super(message, context);
        this.name = 'DerivationExhaustedError';
    }
}

export const describeError = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
