/**
 * Immutable analysis configuration.
 *
 * The sentiment lexicon, label thresholds and input limits are loaded once and
 * passed explicitly into every analyzer call. Nothing here is mutated after
 * creation, so tests can inject their own lexicons without touching globals.
 */

import { z } from 'zod';
import lexiconData from '../data/lexicon.json';

export interface SentimentThresholds {
    /** Scores strictly above this are positive. */
    positive: number;
    /** Scores strictly below this are negative. */
    negative: number;
}

export interface AnalysisLimits {
    maxBatchSize: number;
    maxContentLength: number;
}

export interface AnalysisConfig {
    readonly lexicon: {
        readonly positive: ReadonlySet<string>;
        readonly negative: ReadonlySet<string>;
    };
    readonly thresholds: Readonly<SentimentThresholds>;
    readonly limits: Readonly<AnalysisLimits>;
}

export const DEFAULT_THRESHOLDS: Readonly<SentimentThresholds> = Object.freeze({
    positive: 0.05,
    negative: -0.05,
});

export const DEFAULT_LIMITS: Readonly<AnalysisLimits> = Object.freeze({
    maxBatchSize: 100,
    maxContentLength: 100_000,
});

const lexiconSchema = z.object({
    positive: z.array(z.string().min(1)),
    negative: z.array(z.string().min(1)),
});

export type LexiconDefinition = z.infer<typeof lexiconSchema>;

const thresholdsSchema = z
    .object({
        positive: z.number().min(0).max(1),
        negative: z.number().min(-1).max(0),
    })
    .refine(t => t.negative <= t.positive, {
        message: 'negative threshold must not exceed positive threshold',
    });

const limitsSchema = z.object({
    maxBatchSize: z.number().int().positive(),
    maxContentLength: z.number().int().positive(),
});

export interface AnalysisConfigOptions {
    lexicon?: LexiconDefinition;
    thresholds?: Partial<SentimentThresholds>;
    limits?: Partial<AnalysisLimits>;
}

function toWordSet(words: string[]): ReadonlySet<string> {
    return new Set(words.map(word => word.trim().toLowerCase()).filter(word => word.length > 0));
}

export function createAnalysisConfig(options: AnalysisConfigOptions = {}): AnalysisConfig {
    const lexicon = lexiconSchema.parse(options.lexicon ?? lexiconData);
    const thresholds = thresholdsSchema.parse({ ...DEFAULT_THRESHOLDS, ...options.thresholds });
    const limits = limitsSchema.parse({ ...DEFAULT_LIMITS, ...options.limits });

    return Object.freeze({
        lexicon: Object.freeze({
            positive: toWordSet(lexicon.positive),
            negative: toWordSet(lexicon.negative),
        }),
        thresholds: Object.freeze(thresholds),
        limits: Object.freeze(limits),
    });
}
