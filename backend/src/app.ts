import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { v4 as uuidv4 } from 'uuid';
import { config } from './config';
import { analyzeRouter } from './routes/analyzeRoutes';
import { modelRouter } from './routes/modelRoutes';
import logger from './utils/logger';
import errorHandler from './utils/errorHandler';
import healthMonitor from './utils/healthMonitor';

const app = express();

// Middleware
app.use(cors({ origin: config.allowedOrigins }));
app.use(express.json({ limit: config.jsonBodyLimit }));

// Request tracking middleware with structured logging
app.use((req, _res, next) => {
  const requestId = uuidv4();
  req.reqId = requestId;
  req.log = logger.child(requestId);

  healthMonitor.startRequest(requestId, req.path);

  logger.info('Incoming request', {
    method: req.method,
    path: req.path,
    ip: req.ip,
    userAgent: req.get('user-agent')
  }, requestId);

  next();
});

// Response time tracking
app.use((req, res, next) => {
  const startTime = Date.now();
  res.on('finish', () => {
    const requestId = req.reqId ?? 'unknown';

    logger.info('Request completed', {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime
    }, requestId);

    healthMonitor.endRequest(requestId, res.statusCode < 400);
  });
  next();
});

app.get('/', (_req, res) => {
  res.json({
    name: 'Unstructured Data Insights API',
    status: 'running',
    endpoints: {
      health: '/health',
      metrics: '/api/v1/metrics',
      analyzeText: 'POST /api/v1/analyze/text',
      analyzeFile: 'POST /api/v1/analyze/file',
      analyzeBatch: 'POST /api/v1/analyze/batch',
      modelInfo: '/api/v1/models/info'
    }
  });
});

app.get('/health', (_req, res) => {
  const health = healthMonitor.getHealthStatus();
  res.status(health.status === 'healthy' ? 200 : 503).json({
    status: health.status,
    timestamp: new Date().toISOString(),
    checks: health.checks,
    uptime: health.metrics.uptime,
    memory: health.metrics.memory,
    services: health.metrics.services,
    requests: health.metrics.requests
  });
});

app.get('/api/v1/metrics', (_req, res) => {
  res.json({
    timestamp: new Date().toISOString(),
    ...healthMonitor.getMetrics()
  });
});

// API Routes
app.use('/api/v1/analyze', analyzeRouter);
app.use('/api/v1/models', modelRouter);

// 404 Handler
app.use((req, res) => {
  const requestId = req.reqId;
  logger.warn('Route not found', { path: req.path, method: req.method }, requestId);
  res.status(404).json({
    success: false,
    error: 'RESOURCE_NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
    requestId
  });
});

// Global error handler
app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const requestId = req.reqId ?? 'unknown';
  const appError = errorHandler.handleError(err, requestId);

  res.status(appError.statusCode).json({
    success: false,
    error: appError.code,
    message: appError.userMessage,
    requestId,
    ...(config.nodeEnv === 'development' && {
      details: appError.details
    })
  });
});

export { app };
