export enum ErrorCode {
    // Client errors (400-499)
    VALIDATION_ERROR = 'VALIDATION_ERROR',
    INVALID_INPUT = 'INVALID_INPUT',
    FORMAT_PARSE_ERROR = 'FORMAT_PARSE_ERROR',
    UNSUPPORTED_ANALYSIS_TYPE = 'UNSUPPORTED_ANALYSIS_TYPE',
    EMPTY_BATCH = 'EMPTY_BATCH',
    BATCH_TOO_LARGE = 'BATCH_TOO_LARGE',
    PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
    RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',

    // Server errors (500-599)
    INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AnalysisError extends Error {
    code: ErrorCode;
    details?: Record<string, unknown>;

    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message);
        this.name = 'AnalysisError';
        this.code = code;
        this.details = details;
    }
}

export class InvalidInputError extends AnalysisError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.INVALID_INPUT, details);
        this.name = 'InvalidInputError';
    }
}

export class FormatParseError extends AnalysisError {
    format: 'json' | 'csv';

    constructor(format: 'json' | 'csv', message: string, details?: Record<string, unknown>) {
        super(`Invalid ${format.toUpperCase()} content: ${message}`, ErrorCode.FORMAT_PARSE_ERROR, details);
        this.name = 'FormatParseError';
        this.format = format;
    }
}

export class UnsupportedAnalysisTypeError extends AnalysisError {
    analysisType: string;

    constructor(analysisType: string, supported: readonly string[]) {
        super(
            `Unsupported analysis type "${analysisType}". Supported types: ${supported.join(', ')}`,
            ErrorCode.UNSUPPORTED_ANALYSIS_TYPE,
            { analysisType, supported: [...supported] }
        );
        this.name = 'UnsupportedAnalysisTypeError';
        this.analysisType = analysisType;
    }
}

export class EmptyBatchError extends AnalysisError {
    constructor() {
        super('Batch must contain at least one item', ErrorCode.EMPTY_BATCH);
        this.name = 'EmptyBatchError';
    }
}

export class BatchTooLargeError extends AnalysisError {
    size: number;
    maxSize: number;

    constructor(size: number, maxSize: number) {
        super(`Batch too large (${size} items, max ${maxSize})`, ErrorCode.BATCH_TOO_LARGE, { size, maxSize });
        this.name = 'BatchTooLargeError';
        this.size = size;
        this.maxSize = maxSize;
    }
}

export function isAnalysisError(error: unknown): error is AnalysisError {
    return error instanceof AnalysisError;
}
