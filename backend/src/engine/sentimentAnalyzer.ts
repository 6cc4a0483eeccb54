/**
 * Lexicon sentiment scoring.
 *
 * Counts exact matches of normalized terms against the positive and negative
 * word sets, normalizes the difference by word count and classifies the score
 * with the configured thresholds. Word order never affects the result.
 */

import { FeatureSet, SentimentLabel, SentimentResult } from '../types/index';
import { AnalysisConfig, SentimentThresholds } from './analysisConfig';

const NEUTRAL_CONFIDENCE = 0.5;
const CONFIDENCE_PER_HIT = 0.1;
const MAX_CONFIDENCE = 0.9;

export function classifyScore(score: number, thresholds: Readonly<SentimentThresholds>): SentimentLabel {
    if (score > thresholds.positive) return 'positive';
    if (score < thresholds.negative) return 'negative';
    return 'neutral';
}

export function countLexiconHits(
    terms: readonly string[],
    lexicon: AnalysisConfig['lexicon']
): { positiveHits: number; negativeHits: number } {
    let positiveHits = 0;
    let negativeHits = 0;
    for (const term of terms) {
        if (lexicon.positive.has(term)) positiveHits++;
        if (lexicon.negative.has(term)) negativeHits++;
    }
    return { positiveHits, negativeHits };
}

function confidenceFor(label: SentimentLabel, positiveHits: number, negativeHits: number): number {
    if (label === 'neutral') return NEUTRAL_CONFIDENCE;
    const hits = label === 'positive' ? positiveHits : negativeHits;
    return Math.min(MAX_CONFIDENCE, NEUTRAL_CONFIDENCE + hits * CONFIDENCE_PER_HIT);
}

export function analyzeSentiment(features: FeatureSet, config: AnalysisConfig): SentimentResult {
    const { positiveHits, negativeHits } = countLexiconHits(features.terms, config.lexicon);
    const score = (positiveHits - negativeHits) / Math.max(1, features.wordCount);
    const label = classifyScore(score, config.thresholds);

    return {
        label,
        score,
        confidence: confidenceFor(label, positiveHits, negativeHits),
        positiveHits,
        negativeHits,
        wordCount: features.wordCount,
    };
}
