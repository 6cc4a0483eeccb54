/**
 * System Health Monitoring & Metrics
 * Tracks request outcomes, response times, memory and analyzer availability
 */

import { getAnalysisConfig } from '../services/analysisService';
import logger from './logger';

type ComponentStatus = 'healthy' | 'degraded' | 'down';

export interface HealthMetrics {
    uptime: number;
    memory: {
        used: number;
        total: number;
        percentage: number;
    };
    requests: {
        total: number;
        successful: number;
        failed: number;
        active: number;
        avgResponseTime: number;
    };
    services: {
        analyzers: ComponentStatus;
    };
}

export interface HealthStatus {
    status: 'healthy' | 'degraded';
    checks: Record<string, boolean>;
    metrics: HealthMetrics;
}

interface RequestMetric {
    startTime: number;
    endpoint: string;
}

export class HealthMonitor {
    private startTime: number;
    private requestMetrics = new Map<string, RequestMetric>();
    private totalRequests = 0;
    private successfulRequests = 0;
    private failedRequests = 0;
    private responseTimes: number[] = [];
    private maxResponseTimes = 1000; // Keep last 1000 response times
    private slowRequestMs: number;
    private analyzerStatus: ComponentStatus | null = null;

    constructor(options: { slowRequestMs?: number } = {}) {
        this.startTime = Date.now();
        this.slowRequestMs = options.slowRequestMs ?? 5000;
    }

    /**
     * Start tracking a request
     */
    startRequest(requestId: string, endpoint: string): void {
        this.requestMetrics.set(requestId, {
            startTime: Date.now(),
            endpoint
        });
    }

    /**
     * End tracking a request
     */
    endRequest(requestId: string, success: boolean = true): void {
        const metric = this.requestMetrics.get(requestId);
        if (!metric) return;

        const duration = Date.now() - metric.startTime;

        this.totalRequests++;
        if (success) {
            this.successfulRequests++;
        } else {
            this.failedRequests++;
        }

        if (this.responseTimes.length >= this.maxResponseTimes) {
            this.responseTimes.shift();
        }
        this.responseTimes.push(duration);

        if (duration > this.slowRequestMs) {
            logger.warn('Slow request detected', {
                requestId,
                endpoint: metric.endpoint,
                duration
            });
        }

        this.requestMetrics.delete(requestId);
    }

    getMetrics(): HealthMetrics {
        const memory = process.memoryUsage();

        return {
            uptime: Date.now() - this.startTime,
            memory: {
                used: memory.heapUsed,
                total: memory.heapTotal,
                percentage: (memory.heapUsed / memory.heapTotal) * 100
            },
            requests: {
                total: this.totalRequests,
                successful: this.successfulRequests,
                failed: this.failedRequests,
                active: this.requestMetrics.size,
                avgResponseTime: this.getAverageResponseTime()
            },
            services: {
                analyzers: this.checkAnalyzers()
            }
        };
    }

    getHealthStatus(): HealthStatus {
        const metrics = this.getMetrics();
        const checks = {
            memory: metrics.memory.percentage < 90,
            analyzers: metrics.services.analyzers === 'healthy',
            errorRate: this.getErrorRate() < 0.5
        };

        return {
            status: Object.values(checks).every(c => c) ? 'healthy' : 'degraded',
            checks,
            metrics
        };
    }

    getErrorRate(): number {
        if (this.totalRequests === 0) return 0;
        return this.failedRequests / this.totalRequests;
    }

    private getAverageResponseTime(): number {
        if (this.responseTimes.length === 0) return 0;
        const sum = this.responseTimes.reduce((a, b) => a + b, 0);
        return sum / this.responseTimes.length;
    }

    /**
     * The analyzers are local; they are usable as long as the process-wide configuration loads
     */
    private checkAnalyzers(): ComponentStatus {
        if (this.analyzerStatus === null) {
            try {
                getAnalysisConfig();
                this.analyzerStatus = 'healthy';
            } catch (error) {
                logger.error('Analyzer configuration failed to load', error);
                this.analyzerStatus = 'down';
            }
        }
        return this.analyzerStatus;
    }

    /**
     * Log a health summary periodically; the timer does not keep the process alive
     */
    startPeriodicHealthCheck(intervalMs: number = 5 * 60 * 1000): NodeJS.Timeout {
        const timer = setInterval(() => {
            const status = this.getHealthStatus();

            if (status.status !== 'healthy') {
                logger.warn('System health degraded', {
                    checks: status.checks,
                    metrics: status.metrics
                });
            }

            logger.info('System metrics', {
                uptime: status.metrics.uptime,
                memory: status.metrics.memory.percentage,
                requests: status.metrics.requests,
                services: status.metrics.services
            });
        }, intervalMs);
        timer.unref();
        return timer;
    }

    reset(): void {
        this.totalRequests = 0;
        this.successfulRequests = 0;
        this.failedRequests = 0;
        this.responseTimes = [];
        this.requestMetrics.clear();
    }
}

// Singleton instance
const healthMonitor = new HealthMonitor();

export default healthMonitor;
