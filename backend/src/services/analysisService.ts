import { ZodError } from 'zod';
import { config } from '../config';
import { AnalysisConfig, createAnalysisConfig } from '../engine/analysisConfig';
import { runBatch } from '../engine/batchRunner';
import { analyzers, dispatch } from '../engine/dispatcher';
import {
    ANALYSIS_TYPES,
    AnalysisResponse,
    AnalysisType,
    BatchResult,
    Capabilities,
    FORMAT_HINTS,
    FormatHint,
} from '../types/index';
import logger from '../utils/logger';

export interface ServiceOptions {
    requestId?: string;
    /** Overrides the process-wide configuration, mostly for tests. */
    config?: AnalysisConfig;
}

/** The process environment holds analysis settings the engine rejects. */
export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

let defaultConfig: AnalysisConfig | null = null;

/**
 * Built once from the bundled lexicon and the environment, then reused.
 * server.ts calls this before listening so bad settings stop the process.
 */
export function getAnalysisConfig(): AnalysisConfig {
    if (!defaultConfig) {
        try {
            defaultConfig = createAnalysisConfig({
                thresholds: {
                    positive: config.sentimentPositiveThreshold,
                    negative: config.sentimentNegativeThreshold,
                },
                limits: {
                    maxBatchSize: config.maxBatchSize,
                    maxContentLength: config.maxContentLength,
                },
            });
        } catch (error) {
            if (error instanceof ZodError) {
                const issues = error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`);
                throw new ConfigurationError(`Invalid analysis configuration (${issues.join('; ')})`, { cause: error });
            }
            throw error;
        }
    }
    return defaultConfig;
}

export function analyzeOne(
    content: unknown,
    analysisType: string,
    formatHint: FormatHint = 'auto',
    options: ServiceOptions = {}
): AnalysisResponse {
    const startTime = Date.now();
    const response = dispatch(analysisType, content, options.config ?? getAnalysisConfig(), { formatHint });

    if (response.success) {
        logger.debug('Analysis completed', {
            analysisType,
            formatHint,
            contentLength: response.metadata.contentLength,
            duration: Date.now() - startTime,
        }, options.requestId);
    } else {
        logger.warn('Analysis failed', {
            analysisType,
            formatHint,
            errorCode: response.errorCode,
            error: response.error,
        }, options.requestId);
    }

    return response;
}

export function analyzeBatch(
    contents: readonly unknown[],
    analysisType: string,
    formatHint: FormatHint = 'auto',
    options: ServiceOptions = {}
): BatchResult {
    const startTime = Date.now();
    logger.info(`Batch analysis started for ${contents.length} items`, { analysisType, formatHint }, options.requestId);

    const result = runBatch(contents, analysisType, options.config ?? getAnalysisConfig(), {
        formatHint,
        onItem: (response, index) => {
            if (!response.success) {
                logger.warn(`Batch item ${index} failed`, {
                    errorCode: response.errorCode,
                    error: response.error,
                }, options.requestId);
            }
        },
    });

    logger.info('Batch analysis completed', {
        analysisType,
        totalItems: result.totalItems,
        successfulItems: result.successfulItems,
        duration: Date.now() - startTime,
    }, options.requestId);

    return result;
}

export function describeCapabilities(analysisConfig: AnalysisConfig = getAnalysisConfig()): Capabilities {
    const describe = (type: AnalysisType) => {
        const { description, inputTypes, output } = analyzers[type];
        return { description, inputTypes: [...inputTypes], output };
    };

    return {
        supportedAnalysisTypes: [...ANALYSIS_TYPES],
        supportedFormats: FORMAT_HINTS.filter((hint): hint is Exclude<FormatHint, 'auto'> => hint !== 'auto'),
        formatHints: [...FORMAT_HINTS],
        analyzers: {
            sentiment: describe('sentiment'),
            text: describe('text'),
            data_format: describe('data_format'),
            comprehensive: describe('comprehensive'),
        },
        limits: { ...analysisConfig.limits },
    };
}
