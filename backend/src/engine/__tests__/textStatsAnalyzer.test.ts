import { describe, it, expect } from 'vitest';
import { analyzeTextStats, readabilityScore } from '../textStatsAnalyzer';
import { extractFeatures } from '../tokenizer';

describe('textStatsAnalyzer', () => {
    it('computes statistics for two short sentences', () => {
        const stats = analyzeTextStats(extractFeatures('The cat sat. The dog ran.'));

        expect(stats.wordCount).toBe(6);
        expect(stats.sentenceCount).toBe(2);
        expect(stats.characterCount).toBe(25);
        expect(stats.uniqueWords).toBe(5);
        expect(stats.avgSentenceLength).toBe(3);
        expect(stats.avgWordLength).toBeCloseTo(20 / 6, 10);
        expect(stats.uniqueWordRatio).toBeCloseTo(5 / 6, 10);
        expect(stats.readabilityScore).toBe(100);
    });

    it('returns zeros for empty text', () => {
        const stats = analyzeTextStats(extractFeatures(''));

        expect(stats).toEqual({
            wordCount: 0,
            sentenceCount: 0,
            characterCount: 0,
            uniqueWords: 0,
            avgSentenceLength: 0,
            avgWordLength: 0,
            uniqueWordRatio: 0,
            readabilityScore: 0,
        });
    });

    it('keeps the unique word ratio within (0, 1] for non-empty text', () => {
        const stats = analyzeTextStats(extractFeatures('go go go go'));

        expect(stats.uniqueWordRatio).toBe(0.25);
    });

    it('has a unique word ratio of 1 when no word repeats', () => {
        expect(analyzeTextStats(extractFeatures('Every word here differs.')).uniqueWordRatio).toBe(1);
    });

    describe('readabilityScore', () => {
        it('applies the reading ease formula', () => {
            expect(readabilityScore(150, 5)).toBeCloseTo(50.355, 10);
        });

        it('clamps to the 0-100 range', () => {
            expect(readabilityScore(0, 0)).toBe(100);
            expect(readabilityScore(200, 10)).toBe(0);
        });
    });
});
