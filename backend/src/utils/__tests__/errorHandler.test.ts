import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { BatchTooLargeError, FormatParseError } from '../../engine/errors';
import errorHandler, { ErrorCode } from '../errorHandler';
import logger from '../logger';

describe('ErrorHandler', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('creates errors with the mapped status code', () => {
        expect(errorHandler.createError(ErrorCode.INVALID_INPUT, 'Content cannot be empty')).toEqual({
            code: ErrorCode.INVALID_INPUT,
            message: 'Content cannot be empty',
            statusCode: 400,
            details: undefined,
            userMessage: 'Content cannot be empty',
        });
    });

    it('returns an existing AppError unchanged', () => {
        const appError = errorHandler.createError(ErrorCode.RESOURCE_NOT_FOUND, 'missing');

        expect(errorHandler.handleError(appError)).toBe(appError);
    });

    it('keeps the message of analysis errors', () => {
        const appError = errorHandler.handleError(new FormatParseError('json', 'bad token'));

        expect(appError).toMatchObject({
            code: ErrorCode.FORMAT_PARSE_ERROR,
            statusCode: 422,
            userMessage: 'Invalid JSON content: bad token',
        });
    });

    it('maps batch limits to 413', () => {
        expect(errorHandler.handleError(new BatchTooLargeError(5, 2))).toMatchObject({
            code: ErrorCode.BATCH_TOO_LARGE,
            statusCode: 413,
            details: { size: 5, maxSize: 2 },
        });
    });

    it('classifies zod errors as validation errors', () => {
        const parsed = z.object({ text: z.string() }).safeParse({});
        if (parsed.success) throw new Error('expected validation to fail');

        expect(errorHandler.handleError(parsed.error)).toMatchObject({
            code: ErrorCode.VALIDATION_ERROR,
            statusCode: 400,
            message: 'Invalid request data',
            userMessage: 'The request contains invalid data. Please check your input.',
        });
    });

    it('classifies body parser failures', () => {
        const tooLarge = Object.assign(new Error('request entity too large'), { type: 'entity.too.large' });
        const malformed = Object.assign(new Error('Unexpected token'), { type: 'entity.parse.failed' });

        expect(errorHandler.handleError(tooLarge)).toMatchObject({ code: ErrorCode.PAYLOAD_TOO_LARGE, statusCode: 413 });
        expect(errorHandler.handleError(malformed)).toMatchObject({
            code: ErrorCode.VALIDATION_ERROR,
            message: 'Request body is not valid JSON',
        });
    });

    it('falls back to an internal error and logs it', () => {
        const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);

        const appError = errorHandler.handleError(new Error('boom'), 'req-1');

        expect(appError).toMatchObject({
            code: ErrorCode.INTERNAL_ERROR,
            statusCode: 500,
            message: 'boom',
            userMessage: 'An unexpected error occurred while analyzing your data.',
        });
        expect(errorSpy).toHaveBeenCalledWith('Unhandled error', expect.any(Error), {}, 'req-1');
    });

    it('maps every error code to a status', () => {
        expect(errorHandler.getStatusCode(ErrorCode.UNSUPPORTED_ANALYSIS_TYPE)).toBe(400);
        expect(errorHandler.getStatusCode(ErrorCode.EMPTY_BATCH)).toBe(400);
        expect(errorHandler.getStatusCode(ErrorCode.RESOURCE_NOT_FOUND)).toBe(404);
        expect(errorHandler.getStatusCode(ErrorCode.INTERNAL_ERROR)).toBe(500);
    });
});
