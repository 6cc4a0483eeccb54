import { describe, it, expect } from 'vitest';
import { ANALYSIS_TYPES } from '../../types/index';
import { createAnalysisConfig } from '../analysisConfig';
import { analyzers, contentLength, dispatch, isAnalysisType } from '../dispatcher';
import { ErrorCode, UnsupportedAnalysisTypeError } from '../errors';

const config = createAnalysisConfig();

describe('dispatch', () => {
    it('routes sentiment requests', () => {
        const response = dispatch('sentiment', 'I love this!', config);

        expect(response).toMatchObject({
            success: true,
            analysisType: 'sentiment',
            result: { label: 'positive', positiveHits: 1, wordCount: 3 },
            metadata: { contentLength: 12 },
        });
        if (!response.success || !('score' in response.result)) throw new Error('expected a sentiment result');
        expect(response.result.score).toBeCloseTo(1 / 3, 10);
    });

    it('accepts UTF-8 bytes', () => {
        expect(dispatch('text', Buffer.from('one two'), config)).toMatchObject({
            success: true,
            result: { wordCount: 2 },
            metadata: { contentLength: 7 },
        });
    });

    it('records the item index', () => {
        expect(dispatch('text', 'a b', config, { itemIndex: 4 }).metadata).toEqual({ contentLength: 3, itemIndex: 4 });
    });

    it('passes the format hint to the data format analyzer', () => {
        expect(dispatch('data_format', 'a,b\n1,2', config, { formatHint: 'text' })).toMatchObject({
            success: true,
            result: { detectedFormat: 'text' },
        });
    });

    it('returns a failure for empty content', () => {
        expect(dispatch('text', '', config)).toEqual({
            success: false,
            analysisType: 'text',
            error: 'Content cannot be empty',
            errorCode: ErrorCode.INVALID_INPUT,
            metadata: { contentLength: 0 },
        });
    });

    it('returns a failure for malformed JSON under the json hint', () => {
        expect(dispatch('data_format', '{bad', config, { formatHint: 'json' })).toMatchObject({
            success: false,
            analysisType: 'data_format',
            errorCode: ErrorCode.FORMAT_PARSE_ERROR,
        });
    });

    it('enforces the content length limit', () => {
        const small = createAnalysisConfig({ limits: { maxContentLength: 5 } });

        expect(dispatch('sentiment', 'abcdefgh', small)).toMatchObject({
            success: false,
            errorCode: ErrorCode.INVALID_INPUT,
            error: 'Content too long (8 characters, max 5)',
        });
    });

    it('throws for an unknown analysis type', () => {
        expect(() => dispatch('bogus', 'text', config)).toThrow(UnsupportedAnalysisTypeError);
        expect(() => dispatch('bogus', 'text', config)).toThrow(
            'Unsupported analysis type "bogus". Supported types: sentiment, text, data_format, comprehensive'
        );
    });
});

describe('analyzer registry', () => {
    it('has one analyzer per analysis type', () => {
        for (const type of ANALYSIS_TYPES) {
            expect(analyzers[type].kind).toBe(type);
        }
    });

    it('recognizes analysis types exactly', () => {
        expect(isAnalysisType('data_format')).toBe(true);
        expect(isAnalysisType('TEXT')).toBe(false);
    });
});

describe('contentLength', () => {
    it('counts characters for text and bytes for binary content', () => {
        expect(contentLength('héllo')).toBe(5);
        expect(contentLength(Buffer.from('héllo'))).toBe(6);
        expect(contentLength(42)).toBe(0);
    });
});
