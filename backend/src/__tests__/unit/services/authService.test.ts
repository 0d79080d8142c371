import jwt from 'jsonwebtoken';
import { describe, it, expect } from 'vitest';

import { ownerIdOf, verifyAccessToken } from '@src/services/authService';

const SECRET = 'test-secret';

describe('verifyAccessToken', () => {
  it('returns the payload of a valid token', () => {
    const token = jwt.sign({ userId: 'user-1', email: 'jane@example.com', organizationId: 'org-1' }, SECRET);

    expect(verifyAccessToken(token, SECRET)).toEqual({
      userId: 'user-1',
      email: 'jane@example.com',
      organizationId: 'org-1',
    });
  });

  it('rejects a token signed with another secret', () => {
    const token = jwt.sign({ userId: 'user-1' }, 'other-secret');

    expect(() => verifyAccessToken(token, SECRET)).toThrow('Invalid access token');
  });

  it('rejects a token without a user', () => {
    const token = jwt.sign({ email: 'jane@example.com' }, SECRET);

    expect(() => verifyAccessToken(token, SECRET)).toThrow('Invalid access token payload');
  });

  it('refuses to verify without a secret', () => {
    expect(() => verifyAccessToken('token', '')).toThrow('JWT secret not configured');
  });
});

describe('ownerIdOf', () => {
  it('uses the organization when there is one', () => {
    expect(ownerIdOf({ userId: 'user-1', organizationId: 'org-1' })).toBe('org-1');
    expect(ownerIdOf({ userId: 'user-1' })).toBe('user-1');
  });
});
