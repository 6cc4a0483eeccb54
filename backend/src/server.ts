import { app } from './app';
import { config } from './config';
import { getAnalysisConfig } from './services/analysisService';
import healthMonitor from './utils/healthMonitor';
import logger from './utils/logger';

logger.info('Startup config', {
  port: config.port,
  nodeEnv: config.nodeEnv,
  logLevel: config.logLevel,
  allowedOrigins: config.allowedOrigins,
  maxBatchSize: config.maxBatchSize,
  maxContentLength: config.maxContentLength
});

try {
  getAnalysisConfig();
} catch (error) {
  logger.critical('Analysis configuration is invalid, refusing to start', error);
  process.exit(1);
}

const server = app.listen(config.port, () => {
  logger.info(`Unstructured data insights API running at http://localhost:${config.port}`);
});

healthMonitor.startPeriodicHealthCheck();

const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down`);
  server.close(() => {
    logger.close();
    process.exit(0);
  });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
