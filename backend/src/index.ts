/**
 * Public entry point for embedding the analysis engine without the HTTP layer.
 */

export * from './types/index';
export {
    ErrorCode,
    AnalysisError,
    InvalidInputError,
    FormatParseError,
    UnsupportedAnalysisTypeError,
    EmptyBatchError,
    BatchTooLargeError,
    isAnalysisError,
} from './engine/errors';
export {
    createAnalysisConfig,
    DEFAULT_LIMITS,
    DEFAULT_THRESHOLDS,
} from './engine/analysisConfig';
export type {
    AnalysisConfig,
    AnalysisConfigOptions,
    AnalysisLimits,
    LexiconDefinition,
    SentimentThresholds,
} from './engine/analysisConfig';
export { extractFeatures } from './engine/tokenizer';
export { analyzeSentiment } from './engine/sentimentAnalyzer';
export { analyzeTextStats } from './engine/textStatsAnalyzer';
export { analyzeDataFormat } from './engine/dataFormatAnalyzer';
export { analyzeComprehensive } from './engine/comprehensiveAnalyzer';
export { analyzers, dispatch, isAnalysisType } from './engine/dispatcher';
export type { Analyzer, DispatchOptions } from './engine/dispatcher';
export { runBatch, summarizeBatch } from './engine/batchRunner';
export type { BatchOptions } from './engine/batchRunner';
