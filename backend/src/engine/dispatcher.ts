import {
    ANALYSIS_TYPES,
    AnalysisPayload,
    AnalysisResponse,
    AnalysisResultMap,
    AnalysisType,
    FormatHint,
    ResponseMetadata,
} from '../types/index';
import { AnalysisConfig } from './analysisConfig';
import { analyzeComprehensive } from './comprehensiveAnalyzer';
import { decodeContent } from './content';
import { analyzeDataFormat } from './dataFormatAnalyzer';
import { UnsupportedAnalysisTypeError, isAnalysisError } from './errors';
import { analyzeSentiment } from './sentimentAnalyzer';
import { analyzeTextStats } from './textStatsAnalyzer';
import { extractFeatures } from './tokenizer';

export interface Analyzer<K extends AnalysisType> {
    kind: K;
    description: string;
    inputTypes: string[];
    output: string;
    analyze(payload: AnalysisPayload, config: AnalysisConfig): AnalysisResultMap[K];
}

type AnalyzerRegistry = { [K in AnalysisType]: Analyzer<K> };

export const analyzers: AnalyzerRegistry = {
    sentiment: {
        kind: 'sentiment',
        description: 'Lexicon-based sentiment scoring',
        inputTypes: ['text'],
        output: 'sentiment label, score, confidence and lexicon hit counts',
        analyze: (payload, config) => analyzeSentiment(extractFeatures(payload.text), config),
    },
    text: {
        kind: 'text',
        description: 'Text statistics including readability',
        inputTypes: ['text'],
        output: 'word, sentence and character counts, ratios and readability score',
        analyze: payload => analyzeTextStats(extractFeatures(payload.text)),
    },
    data_format: {
        kind: 'data_format',
        description: 'Format detection and structure profiling',
        inputTypes: ['text', 'json', 'csv'],
        output: 'detected format and a format-specific structural profile',
        analyze: payload => analyzeDataFormat(payload.text, payload.formatHint),
    },
    comprehensive: {
        kind: 'comprehensive',
        description: 'Sentiment, text statistics and data format profiling in one report',
        inputTypes: ['text', 'json', 'csv'],
        output: 'merged report keyed by sub-analysis, with per-entry errors',
        analyze: (payload, config) => analyzeComprehensive(payload, config),
    },
};

export function isAnalysisType(value: string): value is AnalysisType {
    return ANALYSIS_TYPES.some(type => type === value);
}

export function resolveAnalysisType(analysisType: string): AnalysisType {
    if (!isAnalysisType(analysisType)) {
        throw new UnsupportedAnalysisTypeError(analysisType, ANALYSIS_TYPES);
    }
    return analysisType;
}

/** Characters for text, bytes for binary content, 0 for anything else. */
export function contentLength(content: unknown): number {
    if (typeof content === 'string') return content.length;
    if (content instanceof Uint8Array) return content.byteLength;
    return 0;
}

export interface DispatchOptions {
    formatHint?: FormatHint;
    itemIndex?: number;
}

/**
 * Single entry point for every analysis. An unknown type throws;
 * typed input and parse errors come back as a failed response.
 */
export function dispatch(
    analysisType: string,
    content: unknown,
    config: AnalysisConfig,
    options: DispatchOptions = {}
): AnalysisResponse {
    const kind = resolveAnalysisType(analysisType);
    const metadata: ResponseMetadata = { contentLength: contentLength(content) };
    if (options.itemIndex !== undefined) {
        metadata.itemIndex = options.itemIndex;
    }

    try {
        const text = decodeContent(content, config.limits.maxContentLength);
        const payload: AnalysisPayload = { text, formatHint: options.formatHint ?? 'auto' };
        const analyzer: Analyzer<AnalysisType> = analyzers[kind];
        const result = analyzer.analyze(payload, config);
        return { success: true, analysisType: kind, result, metadata };
    } catch (error) {
        if (isAnalysisError(error)) {
            return { success: false, analysisType: kind, error: error.message, errorCode: error.code, metadata };
        }
        throw error;
    }
}
