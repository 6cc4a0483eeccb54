import { FeatureSet, TextStatsResult } from '../types/index';

const READABILITY_BASE = 206.835;
const SENTENCE_LENGTH_WEIGHT = 1.015;
const WORD_LENGTH_WEIGHT = 0.846;

/**
 * Flesch-style reading ease approximated from character lengths:
 * `206.835 - 1.015 * avgSentenceLength - 0.846 * avgWordLength`, clamped to [0, 100].
 */
export function readabilityScore(avgSentenceLength: number, avgWordLength: number): number {
    const raw = READABILITY_BASE - SENTENCE_LENGTH_WEIGHT * avgSentenceLength - WORD_LENGTH_WEIGHT * avgWordLength;
    return Math.max(0, Math.min(100, raw));
}

export function analyzeTextStats(features: FeatureSet): TextStatsResult {
    const { wordCount, sentenceCount, uniqueWords, avgWordLength } = features;
    const avgSentenceLength = wordCount / Math.max(1, sentenceCount);

    return {
        wordCount,
        sentenceCount,
        characterCount: features.charCount,
        uniqueWords,
        avgSentenceLength,
        avgWordLength,
        uniqueWordRatio: uniqueWords / Math.max(1, wordCount),
        readabilityScore: wordCount > 0 ? readabilityScore(avgSentenceLength, avgWordLength) : 0,
    };
}
