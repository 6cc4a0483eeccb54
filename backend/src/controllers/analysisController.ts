import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { analyzeBatch, analyzeOne, describeCapabilities } from '../services/analysisService';
import { AnalysisResponse, FORMAT_HINTS } from '../types/index';
import errorHandler from '../utils/errorHandler';
import InputValidator from '../utils/inputValidator';

const formatHintSchema = z.enum(FORMAT_HINTS);

const textAnalysisSchema = z.object({
  text: z.string(),
  analysisType: z.string().default('comprehensive'),
  formatHint: formatHintSchema.default('auto'),
});

const fileAnalysisSchema = z.object({
  filename: z.string().min(1),
  content: z.string(),
  encoding: z.enum(['utf8', 'base64']).default('utf8'),
  formatType: formatHintSchema.default('auto'),
  analysisType: z.string().default('comprehensive'),
});

const batchAnalysisSchema = z.object({
  texts: z.array(z.string()),
  analysisType: z.string().default('comprehensive'),
  formatHint: formatHintSchema.default('auto'),
});

function sendAnalysisResponse(res: Response, response: AnalysisResponse, extraMetadata: Record<string, unknown> = {}) {
  const status = response.success ? 200 : errorHandler.getStatusCode(response.errorCode);
  res.status(status).json({
    ...response,
    metadata: {
      ...response.metadata,
      ...extraMetadata,
      timestamp: new Date().toISOString(),
    },
  });
}

/**
 * POST /api/v1/analyze/text
 */
export const handleTextAnalysis = (req: Request, res: Response, next: NextFunction) => {
  const requestId = req.reqId ?? 'unknown';

  try {
    const { text, analysisType, formatHint } = textAnalysisSchema.parse(req.body);
    req.log?.info('Text analysis requested', { analysisType, formatHint, textLength: text.length });

    const response = analyzeOne(text, analysisType, formatHint, { requestId });
    sendAnalysisResponse(res, response);
  } catch (error) {
    next(error);
  }
};

/**
 * POST /api/v1/analyze/file
 * File content arrives as UTF-8 text or base64 bytes
 */
export const handleFileAnalysis = (req: Request, res: Response, next: NextFunction) => {
  const requestId = req.reqId ?? 'unknown';

  try {
    const parsed = fileAnalysisSchema.parse(req.body);
    const filename = InputValidator.sanitizeFilename(parsed.filename);
    const content = InputValidator.decodeFileContent(parsed.content, parsed.encoding);
    InputValidator.validateFileSize(content);

    const formatHint = InputValidator.resolveFormatHint(filename, parsed.formatType);
    req.log?.info('File analysis requested', { filename, analysisType: parsed.analysisType, formatHint });

    const response = analyzeOne(content, parsed.analysisType, formatHint, { requestId });
    sendAnalysisResponse(res, response, {
      filename,
      fileSize: typeof content === 'string' ? Buffer.byteLength(content, 'utf8') : content.byteLength,
      formatType: formatHint,
    });
  } catch (error) {
    next(error);
  }
};

/**
 * POST /api/v1/analyze/batch
 */
export const handleBatchAnalysis = (req: Request, res: Response, next: NextFunction) => {
  const requestId = req.reqId ?? 'unknown';

  try {
    const { texts, analysisType, formatHint } = batchAnalysisSchema.parse(req.body);
    const result = analyzeBatch(texts, analysisType, formatHint, { requestId });

    res.json({
      success: true,
      analysisType,
      ...result,
    });
  } catch (error) {
    next(error);
  }
};

/**
 * GET /api/v1/models/info
 */
export const handleCapabilities = (_req: Request, res: Response) => {
  res.json(describeCapabilities());
};
