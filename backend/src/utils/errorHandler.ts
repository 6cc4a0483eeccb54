/**
 * Centralized Error Handling System
 * Classifies errors into AppErrors with status codes and user-facing messages
 */

import { ZodError } from 'zod';
import { ErrorCode, isAnalysisError } from '../engine/errors';
import logger from './logger';

export { ErrorCode };

export interface AppError {
    code: ErrorCode;
    message: string;
    statusCode: number;
    details?: unknown;
    userMessage: string;
}

export function isAppError(error: unknown): error is AppError {
    return (
        typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        'statusCode' in error &&
        'userMessage' in error
    );
}

/** Shape of errors raised by express.json() (body-parser). */
interface BodyParserError extends Error {
    type: string;
    status?: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return error instanceof Error && 'type' in error && typeof error.type === 'string';
}

class ErrorHandler {
    /**
     * Create standardized error object
     */
    createError(
        code: ErrorCode,
        message: string,
        details?: unknown
    ): AppError {
        return {
            code,
            message,
            statusCode: this.getStatusCode(code),
            details,
            userMessage: this.getUserMessage(code, message)
        };
    }

    /**
     * Handle and classify errors
     */
    handleError(error: unknown, requestId?: string): AppError {
        if (isAppError(error)) {
            return error;
        }

        // Core analysis errors carry their own code and a readable message
        if (isAnalysisError(error)) {
            logger.warn('Analysis request rejected', { code: error.code, message: error.message }, requestId);
            return this.createError(error.code, error.message, error.details);
        }

        if (error instanceof ZodError) {
            logger.warn('Validation error', { issues: error.issues }, requestId);
            return this.createError(
                ErrorCode.VALIDATION_ERROR,
                'Invalid request data',
                { issues: error.issues }
            );
        }

        if (isBodyParserError(error)) {
            if (error.type === 'entity.too.large') {
                logger.warn('Request body too large', { type: error.type }, requestId);
                return this.createError(ErrorCode.PAYLOAD_TOO_LARGE, error.message);
            }
            if (error.type === 'entity.parse.failed') {
                logger.warn('Malformed JSON body', { type: error.type }, requestId);
                return this.createError(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON', {
                    originalMessage: error.message
                });
            }
        }

        // Default internal error
        logger.error('Unhandled error', error, {}, requestId);
        return this.createError(
            ErrorCode.INTERNAL_ERROR,
            error instanceof Error ? error.message : 'An unexpected error occurred',
            error instanceof Error ? { stack: error.stack } : undefined
        );
    }

    getStatusCode(code: ErrorCode): number {
        const statusMap: Record<ErrorCode, number> = {
            [ErrorCode.VALIDATION_ERROR]: 400,
            [ErrorCode.INVALID_INPUT]: 400,
            [ErrorCode.FORMAT_PARSE_ERROR]: 422,
            [ErrorCode.UNSUPPORTED_ANALYSIS_TYPE]: 400,
            [ErrorCode.EMPTY_BATCH]: 400,
            [ErrorCode.BATCH_TOO_LARGE]: 413,
            [ErrorCode.PAYLOAD_TOO_LARGE]: 413,
            [ErrorCode.RESOURCE_NOT_FOUND]: 404,
            [ErrorCode.INTERNAL_ERROR]: 500,
        };

        return statusMap[code] || 500;
    }

    private getUserMessage(code: ErrorCode, technicalMessage: string): string {
        const userMessages: Partial<Record<ErrorCode, string>> = {
            [ErrorCode.VALIDATION_ERROR]: 'The request contains invalid data. Please check your input.',
            [ErrorCode.PAYLOAD_TOO_LARGE]: 'The request is too large to process. Please send less data.',
            [ErrorCode.RESOURCE_NOT_FOUND]: 'The requested resource was not found.',
            [ErrorCode.INTERNAL_ERROR]: 'An unexpected error occurred while analyzing your data.',
        };

        // Analysis errors already describe the problem in user terms
        return userMessages[code] ?? technicalMessage;
    }
}

// Singleton instance
const errorHandler = new ErrorHandler();

export default errorHandler;
