import type { ErrorCode } from '../engine/errors';

// ============ Request Types ============

export const ANALYSIS_TYPES = ['sentiment', 'text', 'data_format', 'comprehensive'] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const FORMAT_HINTS = ['text', 'json', 'csv', 'auto'] as const;
export type FormatHint = (typeof FORMAT_HINTS)[number];

export type AnalysisContent = string | Uint8Array;

export interface AnalysisRequest {
    content: AnalysisContent;
    analysisType: AnalysisType;
    formatHint: FormatHint;
}

/**
 * Decoded, validated form of a request that analyzers consume.
 */
export interface AnalysisPayload {
    text: string;
    formatHint: FormatHint;
}

// ============ Feature Types ============

export interface FeatureSet {
    wordCount: number;
    sentenceCount: number;
    charCount: number;
    uniqueWords: number;
    avgWordLength: number;
    /** Whitespace-separated words, in order. */
    tokens: readonly string[];
    /** Tokens lower-cased with surrounding punctuation stripped. */
    terms: readonly string[];
}

// ============ Result Types ============

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface SentimentResult {
    label: SentimentLabel;
    score: number;
    confidence: number;
    positiveHits: number;
    negativeHits: number;
    wordCount: number;
}

export interface TextStatsResult {
    wordCount: number;
    sentenceCount: number;
    characterCount: number;
    uniqueWords: number;
    avgSentenceLength: number;
    avgWordLength: number;
    uniqueWordRatio: number;
    readabilityScore: number;
}

export type ColumnType = 'integer' | 'float' | 'string';

export interface CsvProfile {
    columns: string[];
    columnCount: number;
    rowCount: number;
    columnTypes: Record<string, ColumnType>;
    delimiter: string;
    sampleRows: Array<Record<string, string>>;
}

export type JsonProfile =
    | { topLevelType: 'object'; keyCount: number; keys: string[] }
    | { topLevelType: 'array'; elementCount: number }
    | { topLevelType: 'scalar'; valueType: 'string' | 'number' | 'boolean' | 'null' };

export interface TextProfile {
    lineCount: number;
    wordCount: number;
    characterCount: number;
    sentenceCount: number;
    avgWordLength: number;
}

export type DataFormatResult =
    | { detectedFormat: 'csv'; structure: CsvProfile }
    | { detectedFormat: 'json'; structure: JsonProfile }
    | { detectedFormat: 'text'; structure: TextProfile }
    | { detectedFormat: 'unknown'; structure: { characterCount: number; reason: string } };

export type DetectedFormat = DataFormatResult['detectedFormat'];

export type SubAnalysis<T> =
    | { success: true; result: T }
    | { success: false; error: string; errorCode: ErrorCode };

export interface ComprehensiveResult {
    sentiment: SubAnalysis<SentimentResult>;
    textStatistics: SubAnalysis<TextStatsResult>;
    dataFormat?: SubAnalysis<DataFormatResult>;
}

export interface AnalysisResultMap {
    sentiment: SentimentResult;
    text: TextStatsResult;
    data_format: DataFormatResult;
    comprehensive: ComprehensiveResult;
}

export type AnalysisResult = AnalysisResultMap[AnalysisType];

// ============ Response Types ============

export interface ResponseMetadata {
    contentLength: number;
    itemIndex?: number;
}

export type AnalysisResponse =
    | {
          success: true;
          analysisType: AnalysisType;
          result: AnalysisResult;
          metadata: ResponseMetadata;
      }
    | {
          success: false;
          analysisType: string;
          error: string;
          errorCode: ErrorCode;
          metadata: ResponseMetadata;
      };

export interface BatchSummary {
    successRate: number;
    averageContentLength: number;
    sentimentDistribution?: Partial<Record<SentimentLabel, number>>;
    averageConfidence?: number;
    averageScore?: number;
    averageWordCount?: number;
    totalWords?: number;
    formatDistribution?: Partial<Record<DetectedFormat, number>>;
}

export interface BatchResult {
    results: AnalysisResponse[];
    totalItems: number;
    successfulItems: number;
    failedItems: number;
    summary: BatchSummary;
}

export interface Capabilities {
    supportedAnalysisTypes: AnalysisType[];
    supportedFormats: Array<Exclude<FormatHint, 'auto'>>;
    formatHints: FormatHint[];
    analyzers: Record<AnalysisType, { description: string; inputTypes: string[]; output: string }>;
    limits: { maxBatchSize: number; maxContentLength: number };
}
