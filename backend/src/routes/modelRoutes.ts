import { Router } from 'express';
import { handleCapabilities } from '../controllers/analysisController';

const router = Router();

// GET /api/v1/models/info - Supported analysis types, formats and limits
router.get('/info', handleCapabilities);

export { router as modelRouter };
