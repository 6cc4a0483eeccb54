import {
    AnalysisPayload,
    ComprehensiveResult,
    DataFormatResult,
    FeatureSet,
    SubAnalysis,
} from '../types/index';
import { AnalysisConfig } from './analysisConfig';
import { analyzeDataFormat } from './dataFormatAnalyzer';
import { ErrorCode, isAnalysisError } from './errors';
import { analyzeSentiment } from './sentimentAnalyzer';
import { analyzeTextStats } from './textStatsAnalyzer';
import { extractFeatures } from './tokenizer';

/**
 * Runs one sub-analysis; a failure becomes an error entry instead of aborting the report.
 */
export function runSubAnalysis<T>(fn: () => T): SubAnalysis<T> {
    try {
        return { success: true, result: fn() };
    } catch (error) {
        if (isAnalysisError(error)) {
            return { success: false, error: error.message, errorCode: error.code };
        }
        return {
            success: false,
            error: error instanceof Error ? error.message : String(error),
            errorCode: ErrorCode.INTERNAL_ERROR,
        };
    }
}

function isStructured(result: SubAnalysis<DataFormatResult>): boolean {
    if (!result.success) return true;
    return result.result.detectedFormat === 'json' || result.result.detectedFormat === 'csv';
}

export function analyzeComprehensive(
    payload: AnalysisPayload,
    config: AnalysisConfig
): ComprehensiveResult {
    const features = runSubAnalysis(() => extractFeatures(payload.text));
    const fromFeatures = <T>(analyze: (features: FeatureSet) => T): SubAnalysis<T> =>
        features.success ? runSubAnalysis(() => analyze(features.result)) : features;

    const report: ComprehensiveResult = {
        sentiment: fromFeatures(f => analyzeSentiment(f, config)),
        textStatistics: fromFeatures(analyzeTextStats),
    };

    // Plain text is already covered by the statistics above
    if (payload.formatHint === 'text') {
        return report;
    }

    const dataFormat = runSubAnalysis(() => analyzeDataFormat(payload.text, payload.formatHint));
    if (payload.formatHint !== 'auto' || isStructured(dataFormat)) {
        report.dataFormat = dataFormat;
    }

    return report;
}
