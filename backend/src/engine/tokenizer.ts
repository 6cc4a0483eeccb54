import { FeatureSet } from '../types/index';
import { InvalidInputError } from './errors';

const SENTENCE_BOUNDARY = /[.!?]+/;
const SURROUNDING_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export function tokenize(text: string): string[] {
    return text.split(/\s+/).filter(token => token.length > 0);
}

/**
 * Lower-cases a token and strips leading/trailing punctuation.
 * A token made only of punctuation keeps its lower-cased form.
 */
export function normalizeToken(token: string): string {
    const lowered = token.toLowerCase();
    const stripped = lowered.replace(SURROUNDING_PUNCTUATION, '');
    return stripped.length > 0 ? stripped : lowered;
}

export function countSentences(text: string, wordCount: number): number {
    const segments = text.split(SENTENCE_BOUNDARY).filter(segment => segment.trim().length > 0).length;
    // Text without terminal punctuation is one implicit sentence
    if (segments === 0 && wordCount > 0) return 1;
    return segments;
}

function codePointLength(value: string): number {
    return Array.from(value).length;
}

export function extractFeatures(text: string): FeatureSet {
    if (typeof text !== 'string') {
        throw new InvalidInputError('Content must be text', { receivedType: typeof text });
    }

    const tokens = tokenize(text);
    const terms = tokens.map(normalizeToken);
    const wordCount = tokens.length;
    const totalTokenLength = tokens.reduce((sum, token) => sum + codePointLength(token), 0);

    return Object.freeze({
        wordCount,
        sentenceCount: countSentences(text, wordCount),
        charCount: codePointLength(text),
        uniqueWords: new Set(terms).size,
        avgWordLength: wordCount > 0 ? totalTokenLength / wordCount : 0,
        tokens: Object.freeze(tokens),
        terms: Object.freeze(terms),
    });
}
