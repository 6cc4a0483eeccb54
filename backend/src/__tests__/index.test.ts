import { describe, it, expect } from 'vitest';
import { EmptyBatchError, createAnalysisConfig, dispatch, runBatch } from '../index';

describe('public entry point', () => {
    it('runs analyses without the HTTP layer', () => {
        const config = createAnalysisConfig();

        expect(dispatch('text', 'Short and sweet.', config)).toMatchObject({
            success: true,
            result: { wordCount: 3, sentenceCount: 1 },
        });
        expect(() => runBatch([], 'text', config)).toThrow(EmptyBatchError);
    });
});
