// =====================================================
// API Session Tests
// =====================================================

import { describe, it, expect, vi } from 'vitest';
import { createMockTransport, sequence } from '../../../test/helpers/http.helper';
import type { MockHandler } from '../../../test/helpers/http.helper';
import { AuthError } from './errors';
import { ApiSession } from './session';

const credentials = { email: 'scout@example.test', password: 'test-secret' };

function createSession(handler: MockHandler) {
  const transport = createMockTransport(handler);
  const sleeper = vi.fn(async (_ms: number) => {});
  const session = new ApiSession(
    credentials,
    { baseUrl: 'https://api.test', timeoutMs: 1000, retry: { initialDelayMs: 10 }, adapter: transport.adapter },
    sleeper
  );
  return { session, transport, sleeper };
}

describe('ApiSession', () => {
  describe('authenticate', () => {
    it('posts the credentials as query parameters and keeps the token', async () => {
      const { session, transport } = createSession(() => ({ status: 200, data: { token: 'test-token' } }));

      await expect(session.authenticate()).resolves.toBe('test-token');

      expect(session.isAuthenticated).toBe(true);
      expect(transport.requests).toHaveLength(1);
      expect(transport.requests[0]).toMatchObject({
        method: 'POST',
        url: '/login',
        params: { email: 'scout@example.test', password: 'test-secret' },
      });
    });

    it('raises AuthError when the login is rejected', async () => {
      const { session, transport } = createSession(() => ({ status: 401, data: { message: 'Unauthorized' } }));

      const error = await session.authenticate().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toMatchObject({ message: 'Login rejected with status 401', statusCode: 401 });
      expect(transport.requests).toHaveLength(1);
      expect(session.isAuthenticated).toBe(false);
    });

    it('raises AuthError when the response has no token', async () => {
      const { session } = createSession(() => ({ status: 200, data: { user: 'scout' } }));

      await expect(session.authenticate()).rejects.toThrow('Login response did not contain a token');
    });

    it('raises AuthError when the server cannot be reached', async () => {
      const { session, transport } = createSession(() => ({ networkError: 'ECONNREFUSED' }));

      await expect(session.authenticate()).rejects.toThrow('Login request failed: connect ECONNREFUSED');
      expect(transport.requests).toHaveLength(4);
    });

    it('retries transient login failures', async () => {
      const { session, transport, sleeper } = createSession(
        sequence({ status: 503 }, { status: 200, data: { token: 'test-token' } })
      );

      await expect(session.authenticate()).resolves.toBe('test-token');
      expect(transport.requests).toHaveLength(2);
      expect(sleeper).toHaveBeenCalledTimes(1);
    });
  });

  describe('headers', () => {
    it('logs in once and reuses the token', async () => {
      const { session, transport } = createSession(() => ({ status: 200, data: { token: 'test-token' } }));

      const [first, second] = await Promise.all([session.headers(), session.headers()]);
      const third = await session.headers();

      expect(first).toEqual({ Authorization: 'Bearer test-token' });
      expect(second).toEqual(first);
      expect(third).toEqual(first);
      expect(transport.requests).toHaveLength(1);
    });

    it('tries again on the next call after a failed login', async () => {
      const { session, transport } = createSession(
        sequence({ status: 401 }, { status: 200, data: { token: 'test-token' } })
      );

      await expect(session.headers()).rejects.toBeInstanceOf(AuthError);
      await expect(session.headers()).resolves.toEqual({ Authorization: 'Bearer test-token' });
      expect(transport.requests).toHaveLength(2);
    });
  });
});
