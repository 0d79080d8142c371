import { Request, Response, NextFunction } from 'express';
import logger from 'jet-logger';

import { verifyAccessToken } from '@src/services/authService';

export const authenticate = (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  try {
    // Get token from cookie or Authorization header
    const cookieToken: unknown = req.cookies?.accessToken;
    const token = typeof cookieToken === 'string' && cookieToken
      ? cookieToken
      : req.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      res.status(401).json({ error: 'No token provided' });
      return;
    }

    // Attach payload to request
    req.tokenPayload = verifyAccessToken(token);
    next();
  } catch (error) {
    logger.warn(`🚫 Authentication failed: ${error instanceof Error ? error.message : String(error)}`);
    res.status(401).json({ error: 'Invalid token' });
  }
};
