import jwt from 'jsonwebtoken';
import { z } from 'zod';

import ENV from '@src/common/constants/ENV';

/**
 * Tokens are issued by the account service; this API only verifies them.
 */
const TokenPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string().optional(),
  name: z.string().optional(),
  organizationId: z.string().optional(), // Organization the user belongs to
  orgRole: z.string().optional(), // Role within organization
});

export type TokenPayload = z.infer<typeof TokenPayloadSchema>;

export const verifyAccessToken = (token: string, secret: string = ENV.JwtSecret): TokenPayload => {
  if (!secret) {
    throw new Error('JWT secret not configured');
  }

  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret);
  } catch (error) {
    throw new Error('Invalid access token');
  }

  const parsed = TokenPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new Error('Invalid access token payload');
  }
  return parsed.data;
};

/**
 * Batches belong to the caller's organization, or to the user when the token
 * carries no organization.
 */
export const ownerIdOf = (payload: TokenPayload): string => payload.organizationId ?? payload.userId;
