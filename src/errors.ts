/**
 * Error categories surfaced by the administrative paths, plus the decode
 * failure used inside the consumer. Each category carries the HTTP status
 * the API answers with.
 */

export enum ErrorCode {
    INTERNAL = 'INTERNAL',
    VALIDATION = 'VALIDATION',
    NOT_FOUND = 'NOT_FOUND',
    DECODE = 'DECODE',
    UPSTREAM = 'UPSTREAM',
    SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
}

const ERROR_HTTP_STATUS: Record<ErrorCode, number> = {
    [ErrorCode.INTERNAL]: 500,
    [ErrorCode.VALIDATION]: 400,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.DECODE]: 400,
    [ErrorCode.UPSTREAM]: 502,
    [ErrorCode.SERVICE_UNAVAILABLE]: 503,
};

export class AppError extends Error {
    public readonly code: ErrorCode;
    public readonly httpStatus: number;
    public readonly context: Record<string, unknown>;

    constructor(
        message: string,
        code: ErrorCode = ErrorCode.INTERNAL,
        context: Record<string, unknown> = {},
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.httpStatus = ERROR_HTTP_STATUS[code];
        this.context = context;
    }

    toJSON(): Record<string, unknown> {
        return {
            error: this.code,
            message: this.message,
            context: this.context,
        };
    }
}

export class ValidationError extends AppError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, ErrorCode.VALIDATION, context);
    }
}

export class NotFoundError extends AppError {
    constructor(resource: string, id?: string, context: Record<string, unknown> = {}) {
        const msg = id ? `${resource} '${id}' not found` : `${resource} not found`;
        super(msg, ErrorCode.NOT_FOUND, { resource, id, ...context });
    }
}

/** Raised for a bus payload that cannot become a Reading. */
export class DecodeError extends AppError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, ErrorCode.DECODE, context);
    }
}

/** The collaborator answered, but not with something usable. */
export class UpstreamError extends AppError {
    constructor(service: string, message: string, context: Record<string, unknown> = {}) {
        super(`${service}: ${message}`, ErrorCode.UPSTREAM, { service, ...context });
    }
}

/** The collaborator could not be reached or did not answer in time. */
export class ServiceUnavailableError extends AppError {
    constructor(service: string, message: string, context: Record<string, unknown> = {}) {
        super(`${service} unavailable: ${message}`, ErrorCode.SERVICE_UNAVAILABLE, { service, ...context });
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
