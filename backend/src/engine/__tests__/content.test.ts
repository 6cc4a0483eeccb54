import { describe, it, expect } from 'vitest';
import { decodeContent } from '../content';
import { InvalidInputError } from '../errors';

describe('decodeContent', () => {
    it('passes text through', () => {
        expect(decodeContent('hello', 10)).toBe('hello');
    });

    it('decodes UTF-8 bytes', () => {
        expect(decodeContent(Buffer.from('héllo wörld', 'utf8'), 100)).toBe('héllo wörld');
    });

    it('rejects bytes that are not UTF-8', () => {
        expect(() => decodeContent(new Uint8Array([0xff, 0xfe, 0xfd]), 100)).toThrow('Content is not valid UTF-8 text');
    });

    it('rejects blank content', () => {
        expect(() => decodeContent('   \n', 100)).toThrow(InvalidInputError);
        expect(() => decodeContent('', 100)).toThrow('Content cannot be empty');
    });

    it('rejects values that are neither text nor bytes', () => {
        expect(() => decodeContent(42, 100)).toThrow('Content must be text or bytes');
        expect(() => decodeContent(null, 100)).toThrow('Content must be text or bytes');
    });

    it('rejects content over the length limit', () => {
        expect(() => decodeContent('abcdef', 5)).toThrow('Content too long (6 characters, max 5)');
        expect(decodeContent('abcde', 5)).toBe('abcde');
    });
});
