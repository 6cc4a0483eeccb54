/**
 * Batch analysis with per-item failure isolation.
 *
 * The whole batch is rejected up front when it is empty, too large or asks
 * for an unknown analysis type. After that every item produces exactly one
 * response at its own position, whatever happens to the others.
 */

import {
    AnalysisResponse,
    AnalysisType,
    BatchResult,
    BatchSummary,
    DetectedFormat,
    FormatHint,
    SentimentLabel,
} from '../types/index';
import { AnalysisConfig } from './analysisConfig';
import { contentLength, dispatch, resolveAnalysisType } from './dispatcher';
import { BatchTooLargeError, EmptyBatchError, ErrorCode, isAnalysisError } from './errors';

export interface BatchOptions {
    formatHint?: FormatHint;
    onItem?: (response: AnalysisResponse, index: number) => void;
}

type SuccessResponse = Extract<AnalysisResponse, { success: true }>;

function average(values: number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
    counts[key] = (counts[key] ?? 0) + 1;
}

function wordCountOf(response: SuccessResponse): number | undefined {
    const { result } = response;
    if ('readabilityScore' in result) {
        return result.wordCount;
    }
    if ('textStatistics' in result) {
        return result.textStatistics.success ? result.textStatistics.result.wordCount : undefined;
    }
    return undefined;
}

export function summarizeBatch(results: AnalysisResponse[], analysisType: AnalysisType): BatchSummary {
    const successful = results.filter((r): r is SuccessResponse => r.success);
    const summary: BatchSummary = {
        successRate: results.length > 0 ? successful.length / results.length : 0,
        averageContentLength: average(successful.map(r => r.metadata.contentLength)),
    };

    if (successful.length === 0) {
        return summary;
    }

    switch (analysisType) {
        case 'sentiment': {
            const distribution: Partial<Record<SentimentLabel, number>> = {};
            const confidences: number[] = [];
            const scores: number[] = [];
            for (const response of successful) {
                if ('label' in response.result) {
                    increment(distribution, response.result.label);
                    confidences.push(response.result.confidence);
                    scores.push(response.result.score);
                }
            }
            summary.sentimentDistribution = distribution;
            summary.averageConfidence = average(confidences);
            summary.averageScore = average(scores);
            break;
        }
        case 'text':
        case 'comprehensive': {
            const wordCounts = successful
                .map(wordCountOf)
                .filter((count): count is number => count !== undefined);
            summary.averageWordCount = average(wordCounts);
            summary.totalWords = wordCounts.reduce((sum, count) => sum + count, 0);
            break;
        }
        case 'data_format': {
            const distribution: Partial<Record<DetectedFormat, number>> = {};
            for (const response of successful) {
                if ('detectedFormat' in response.result) {
                    increment(distribution, response.result.detectedFormat);
                }
            }
            summary.formatDistribution = distribution;
            break;
        }
    }

    return summary;
}

function failureFor(error: unknown, analysisType: AnalysisType, index: number, content: unknown): AnalysisResponse {
    return {
        success: false,
        analysisType,
        error: error instanceof Error ? error.message : String(error),
        errorCode: isAnalysisError(error) ? error.code : ErrorCode.INTERNAL_ERROR,
        metadata: {
            contentLength: contentLength(content),
            itemIndex: index,
        },
    };
}

export function runBatch(
    items: readonly unknown[],
    analysisType: string,
    config: AnalysisConfig,
    options: BatchOptions = {}
): BatchResult {
    if (items.length === 0) {
        throw new EmptyBatchError();
    }
    if (items.length > config.limits.maxBatchSize) {
        throw new BatchTooLargeError(items.length, config.limits.maxBatchSize);
    }
    const kind = resolveAnalysisType(analysisType);

    const results = items.map((content, index) => {
        let response: AnalysisResponse;
        try {
            response = dispatch(kind, content, config, { formatHint: options.formatHint, itemIndex: index });
        } catch (error) {
            response = failureFor(error, kind, index, content);
        }
        options.onItem?.(response, index);
        return response;
    });

    const successfulItems = results.filter(r => r.success).length;

    return {
        results,
        totalItems: items.length,
        successfulItems,
        failedItems: items.length - successfulItems,
        summary: summarizeBatch(results, kind),
    };
}
