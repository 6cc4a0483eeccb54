/**
 * Input Validation & Sanitization Utilities
 * Prepares uploaded file payloads before they reach the analysis engine
 */

import { FormatHint } from '../types/index';
import errorHandler, { ErrorCode } from './errorHandler';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const EXTENSION_FORMATS: Record<string, Exclude<FormatHint, 'auto'>> = {
    json: 'json',
    csv: 'csv',
    txt: 'text',
    text: 'text',
    md: 'text',
};

export type FileEncoding = 'utf8' | 'base64';

export class InputValidator {
    /**
     * Replace anything outside word characters, dots and hyphens, and cap the length
     */
    static sanitizeFilename(filename: string): string {
        if (!filename || typeof filename !== 'string') {
            throw errorHandler.createError(
                ErrorCode.INVALID_INPUT,
                'Filename must be a non-empty string'
            );
        }

        return filename.replace(/[^\w.-]/g, '_').slice(0, 100);
    }

    static getFileExtension(filename: string): string {
        return filename.includes('.') ? (filename.split('.').pop() ?? '').toLowerCase() : '';
    }

    /**
     * An explicit format wins; `auto` is narrowed by a known file extension
     */
    static resolveFormatHint(filename: string, formatType: FormatHint): FormatHint {
        if (formatType !== 'auto') {
            return formatType;
        }
        return EXTENSION_FORMATS[InputValidator.getFileExtension(filename)] ?? 'auto';
    }

    /**
     * Decode file content sent as UTF-8 text or base64 bytes
     */
    static decodeFileContent(content: string, encoding: FileEncoding): string | Uint8Array {
        if (encoding === 'utf8') {
            return content;
        }

        const compact = content.replace(/\s+/g, '');
        if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
            throw errorHandler.createError(
                ErrorCode.INVALID_INPUT,
                'File content is not valid base64',
                { length: content.length }
            );
        }

        return Buffer.from(compact, 'base64');
    }

    /**
     * Validate file content size
     */
    static validateFileSize(content: string | Uint8Array, maxSizeKB: number = 1024): void {
        const bytes = typeof content === 'string' ? Buffer.byteLength(content, 'utf8') : content.byteLength;
        const sizeKB = bytes / 1024;

        if (sizeKB > maxSizeKB) {
            throw errorHandler.createError(
                ErrorCode.PAYLOAD_TOO_LARGE,
                `File size (${Math.round(sizeKB)}KB) exceeds maximum (${maxSizeKB}KB)`,
                { sizeKB, maxSizeKB }
            );
        }
    }
}

export default InputValidator;
