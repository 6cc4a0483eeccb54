import { TextDecoder } from 'util';
import { InvalidInputError } from './errors';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeBytes(bytes: Uint8Array): string {
    try {
        return utf8.decode(bytes);
    } catch (error) {
        throw new InvalidInputError('Content is not valid UTF-8 text', {
            byteLength: bytes.byteLength,
            cause: error instanceof Error ? error.message : String(error),
        });
    }
}

/**
 * Turns raw request content into analyzable text.
 * Rejects non-text values, undecodable bytes, blank content and content over the length limit.
 */
export function decodeContent(content: unknown, maxLength: number): string {
    let text: string;
    if (typeof content === 'string') {
        text = content;
    } else if (content instanceof Uint8Array) {
        text = decodeBytes(content);
    } else {
        throw new InvalidInputError('Content must be text or bytes', {
            receivedType: content === null ? 'null' : typeof content,
        });
    }

    if (text.trim().length === 0) {
        throw new InvalidInputError('Content cannot be empty');
    }

    if (text.length > maxLength) {
        throw new InvalidInputError(`Content too long (${text.length} characters, max ${maxLength})`, {
            length: text.length,
            maxLength,
        });
    }

    return text;
}
