import { Router } from 'express';
import {
    handleBatchAnalysis,
    handleFileAnalysis,
    handleTextAnalysis,
} from '../controllers/analysisController';

const router = Router();

// POST /api/v1/analyze/text - Analyze a single text payload
router.post('/text', handleTextAnalysis);

// POST /api/v1/analyze/file - Analyze an uploaded file (utf8 or base64 content)
router.post('/file', handleFileAnalysis);

// POST /api/v1/analyze/batch - Analyze many texts, one result per item
router.post('/batch', handleBatchAnalysis);

export { router as analyzeRouter };
