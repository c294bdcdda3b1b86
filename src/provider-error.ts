export class ProviderError extends Error {
    constructor(message: string, public readonly code: ErrorCode = ErrorCode.Unknown) {
        super(message);
        this.name = 'ProviderError';
    }
}

export class ConfigurationError extends ProviderError {
    constructor(message: string) {
        super(message, ErrorCode.Configuration);
        this.name = 'ConfigurationError';
    }
}

export class ValidationError extends ProviderError {
    constructor(message: string) {
        super(message, ErrorCode.Validation);
        this.name = 'ValidationError';
    }
}

/**
 * Failure of the role exchange. Carries the error raised by the API client (if any),
 * and the API error code / request id when the service returned them.
 */
export class ExchangeError extends ProviderError {
    public readonly apiCode?: string;
    public readonly requestId?: string;

    constructor(message: string, public readonly cause?: unknown) {
        super(message, ErrorCode.Exchange);
        this.name = 'ExchangeError';
        if (isApiError(cause)) {
            this.apiCode = cause.code;
            this.requestId = cause.requestId;
        }
    }
}

export enum ErrorCode {
    Unknown,
    Configuration,
    Validation,
    Exchange,
}

interface ApiError {
    code?: string;
    requestId?: string;
}

export const isApiError = (err: unknown): err is Error & ApiError => {
    if (!(err instanceof Error)) { return false; }
    const code = 'code' in err ? err.code : undefined;
    const requestId = 'requestId' in err ? err.requestId : undefined;
    if (code !== undefined && typeof code !== 'string') { return false; }
    if (requestId !== undefined && typeof requestId !== 'string') { return false; }
    return code !== undefined || requestId !== undefined;
};
