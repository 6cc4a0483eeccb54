import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_LIMITS, DEFAULT_THRESHOLDS, createAnalysisConfig } from '../analysisConfig';

describe('createAnalysisConfig', () => {
    it('loads the bundled lexicon with default thresholds and limits', () => {
        const config = createAnalysisConfig();

        expect(config.lexicon.positive.has('good')).toBe(true);
        expect(config.lexicon.negative.has('bad')).toBe(true);
        expect(config.thresholds).toEqual(DEFAULT_THRESHOLDS);
        expect(config.limits).toEqual({ maxBatchSize: 100, maxContentLength: 100_000 });
    });

    it('returns a frozen configuration', () => {
        const config = createAnalysisConfig();

        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.thresholds)).toBe(true);
        expect(Object.isFrozen(config.limits)).toBe(true);
    });

    it('normalizes lexicon entries', () => {
        const config = createAnalysisConfig({ lexicon: { positive: [' Great '], negative: ['BAD'] } });

        expect([...config.lexicon.positive]).toEqual(['great']);
        expect([...config.lexicon.negative]).toEqual(['bad']);
    });

    it('merges partial limits over the defaults', () => {
        const config = createAnalysisConfig({ limits: { maxBatchSize: 5 } });

        expect(config.limits).toEqual({ maxBatchSize: 5, maxContentLength: DEFAULT_LIMITS.maxContentLength });
    });

    it('rejects out-of-range thresholds', () => {
        expect(() => createAnalysisConfig({ thresholds: { positive: -0.1 } })).toThrow(ZodError);
        expect(() => createAnalysisConfig({ thresholds: { negative: 0.2 } })).toThrow(ZodError);
    });

    it('rejects non-positive limits', () => {
        expect(() => createAnalysisConfig({ limits: { maxBatchSize: 0 } })).toThrow(ZodError);
    });

    it('rejects empty lexicon words', () => {
        expect(() => createAnalysisConfig({ lexicon: { positive: [''], negative: [] } })).toThrow(ZodError);
    });
});
