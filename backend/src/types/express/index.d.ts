import 'express';
import type { RequestLogger } from '../../utils/logger';

// Declaration merging adds the request id and scoped logger set by the
// request tracking middleware in app.ts.
declare global {
  namespace Express {
    export interface Request {
      reqId?: string;
      log?: RequestLogger;
    }
  }
}
