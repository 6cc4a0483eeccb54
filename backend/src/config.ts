/**
 * config.ts — Centralized server configuration from environment variables
 */

import dotenv from 'dotenv';

dotenv.config();

export function parsePositiveInt(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const n = Number(value);
    if (!Number.isFinite(n) || n < 1) return fallback;
    return Math.floor(n);
}

export function parseNumber(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const n = Number(value);
    return Number.isFinite(n) ? n : fallback;
}

export function parseList(value: string | undefined, fallback: string): string[] {
    return (value || fallback)
        .split(',')
        .map(item => item.trim())
        .filter(Boolean);
}

export const config = {
    // Server
    port: parsePositiveInt(process.env.PORT, 3001),
    nodeEnv: process.env.NODE_ENV || 'development',
    jsonBodyLimit: process.env.JSON_BODY_LIMIT || '5mb',

    // CORS
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS, 'http://localhost:3000,http://localhost:8080'),

    // Logging
    logLevel: process.env.LOG_LEVEL || 'info',
    logToFile: process.env.LOG_TO_FILE === 'true',
    logDir: process.env.LOG_DIR || 'logs',

    // Analysis limits
    maxBatchSize: parsePositiveInt(process.env.MAX_BATCH_SIZE, 100),
    maxContentLength: parsePositiveInt(process.env.MAX_CONTENT_LENGTH, 100_000),

    // Sentiment label thresholds
    sentimentPositiveThreshold: parseNumber(process.env.SENTIMENT_POSITIVE_THRESHOLD, 0.05),
    sentimentNegativeThreshold: parseNumber(process.env.SENTIMENT_NEGATIVE_THRESHOLD, -0.05),
} as const;

export type Config = typeof config;
