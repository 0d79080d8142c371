import { Router } from 'express';

import Paths from '@src/common/constants/Paths';
import type { AppServices } from '@src/config/services';
import { authenticate } from '@src/middleware/auth';
import uploadsRouter from './uploads.routes';


/******************************************************************************
                                Setup
******************************************************************************/

/**
 * Root API router (mounted at /api in server.ts)
 */
export default function createApiRouter(services: AppServices, maxUploadBytes: number): Router {
  const apiRouter = Router();

  /** Uploads */
  apiRouter.use(Paths.Uploads.Base, authenticate, uploadsRouter(services, maxUploadBytes)); // → /api/uploads/...

  return apiRouter;
}
