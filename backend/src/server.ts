import mongoose from 'mongoose';
import morgan from 'morgan';
import helmet from 'helmet';
import compression from 'compression';
import cors from 'cors';
import cookieParser from 'cookie-parser';
import express, { Express, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import multer from 'multer';
import logger from 'jet-logger';

import createApiRouter from '@src/routes';
import type { AppServices } from '@src/config/services';

import Paths from '@src/common/constants/Paths';
import ENV from '@src/common/constants/ENV';
import HttpStatusCodes from '@src/common/constants/HttpStatusCodes';
import { RouteError } from '@src/common/util/route-errors';
import { NodeEnvs } from '@src/common/constants';


/******************************************************************************
                                Setup
******************************************************************************/

export function createServer(services: AppServices): Express {
  const app = express();

  /** ******** Middleware ******** **/

  // Body parsers (JSON uploads carry whole sheets)
  app.use(express.urlencoded({ extended: true }));
  app.use(express.json({ limit: ENV.UploadMaxBytes }));

  // Cookie parser
  app.use(cookieParser());

  // Compression
  app.use(compression());

  // CORS
  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin || ENV.AllowedOrigins.includes(origin)) return cb(null, true);
        return cb(new Error('Not allowed by CORS'));
      },
      credentials: true, // Important for cookies
    }),
  );

  // Show routes called in console during development
  if (ENV.NodeEnv === NodeEnvs.Dev) {
    app.use(morgan('dev'));
  }

  // Rate limiting - protect against abuse and overload
  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: ENV.RateLimitMaxRequests,
    standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
    legacyHeaders: false, // Disable the `X-RateLimit-*` headers
    message: 'Too many requests from this IP, please try again later.',
  });

  // Apply rate limiting to all API routes
  app.use('/api/', limiter);

  // Security
  if (ENV.NodeEnv === NodeEnvs.Production) {
    app.use(helmet());
  }

  /** ******** Routes ******** **/

  app.use(Paths.Base, createApiRouter(services, ENV.UploadMaxBytes));

  // Health check
  app.get('/health', (_: Request, res: Response) => {
    const mongoStatus = mongoose.connection.readyState === 1 ? 'connected' : 'disconnected';
    res.json({
      ok: true,
      mongodb: mongoStatus,
      enrichmentCache: services.cache.getStats(),
      skipTraceQueue: services.client.getStats(),
    });
  });

  /** ******** Error handler ******** **/
  app.use((err: Error, _: Request, res: Response, _next: NextFunction) => {
    let status = HttpStatusCodes.INTERNAL_SERVER_ERROR;
    if (err instanceof RouteError) {
      status = err.status;
    } else if (err instanceof multer.MulterError) {
      status = HttpStatusCodes.BAD_REQUEST;
    }

    if (ENV.NodeEnv !== NodeEnvs.Test && status >= HttpStatusCodes.INTERNAL_SERVER_ERROR) {
      logger.err(err, true);
    }
    res.status(status).json({ error: err.message });
  });

  return app;
}

export default createServer;
