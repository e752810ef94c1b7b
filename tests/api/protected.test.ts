/**
 * Protected API Endpoint Tests
 *
 * Tests for the bearer-token protected endpoints and the three ways a
 * request can be refused.
 *
 * Endpoints tested:
 * - GET /v1/protected/ - Access check
 * - GET /v1/protected/data - Example protected payload
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ApiErrorResponse } from '../../src/api/types';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { createAuthHeader, getJsonResponse, withTemporaryTokens } from '../helpers';

const TEST_TOKEN = 'test-token-123';

interface ProtectedDataResponse {
  message: string;
  data: string[];
  token_preview: string;
}

describe('Protected API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext({ tokens: [TEST_TOKEN] });
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  // ==========================================================================
  // Accepted requests
  // ==========================================================================
  describe('with a valid token', () => {
    it('should grant access', async () => {
      // Act
      const response = await ctx.app.request('/v1/protected/', {
        headers: createAuthHeader(TEST_TOKEN),
      });

      // Assert
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ message: 'Access granted', authenticated: 'true' });
    });

    it('should return the protected data with a token preview', async () => {
      // Act
      const response = await ctx.app.request('/v1/protected/data', {
        headers: createAuthHeader(TEST_TOKEN),
      });
      const json = await getJsonResponse<ProtectedDataResponse>(response);

      // Assert
      expect(response.status).toBe(200);
      expect(json).toEqual({
        message: 'This is protected data',
        data: ['item1', 'item2', 'item3'],
        token_preview: 'test-tok...',
      });
    });

    it('should accept the scheme in lower case', async () => {
      const response = await ctx.app.request('/v1/protected', {
        headers: { Authorization: `bearer ${TEST_TOKEN}` },
      });

      expect(response.status).toBe(200);
    });
  });

  // ==========================================================================
  // Refused requests
  // ==========================================================================
  describe('refusals', () => {
    it('should return 401 with a Bearer challenge when no token is sent', async () => {
      // Act
      const response = await ctx.app.request('/v1/protected/');
      const json = await getJsonResponse<ApiErrorResponse>(response);

      // Assert
      expect(response.status).toBe(401);
      expect(response.headers.get('WWW-Authenticate')).toBe('Bearer');
      expect(json).toEqual({ detail: 'Missing bearer token', code: 'UNAUTHORIZED' });
    });

    it('should return 401 for a non-Bearer scheme', async () => {
      const response = await ctx.app.request('/v1/protected/', {
        headers: { Authorization: `Basic ${TEST_TOKEN}` },
      });

      expect(response.status).toBe(401);
    });

    it('should return 403 for an unknown token', async () => {
      // Act
      const response = await ctx.app.request('/v1/protected/data', {
        headers: createAuthHeader('wrong-token'),
      });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      // Assert
      expect(response.status).toBe(403);
      expect(json).toEqual({ detail: 'Invalid bearer token', code: 'FORBIDDEN' });
    });

    it('should return 500 when the token store has been emptied', async () => {
      await withTemporaryTokens(ctx.tokenStore, null, async () => {
        // Act
        const response = await ctx.app.request('/v1/protected/', {
          headers: createAuthHeader(TEST_TOKEN),
        });
        const json = await getJsonResponse<ApiErrorResponse>(response);

        // Assert
        expect(response.status).toBe(500);
        expect(json).toEqual({
          detail: 'Bearer token authentication is not configured',
          code: 'CONFIGURATION_ERROR',
        });
      });

      // The original tokens are back
      const response = await ctx.app.request('/v1/protected/', {
        headers: createAuthHeader(TEST_TOKEN),
      });
      expect(response.status).toBe(200);
    });

    it('should honour temporarily installed tokens', async () => {
      await withTemporaryTokens(ctx.tokenStore, ['other-token'], async () => {
        const accepted = await ctx.app.request('/v1/protected/', {
          headers: createAuthHeader('other-token'),
        });
        const refused = await ctx.app.request('/v1/protected/', {
          headers: createAuthHeader(TEST_TOKEN),
        });

        expect(accepted.status).toBe(200);
        expect(refused.status).toBe(403);
      });
    });
  });
});

describe('Protected API without configured tokens', () => {
  it('should not be mounted', async () => {
    // Arrange
    const ctx = await createTestContext();

    // Act
    const response = await ctx.app.request('/v1/protected/', {
      headers: createAuthHeader(TEST_TOKEN),
    });
    const json = await getJsonResponse<ApiErrorResponse>(response);

    // Assert
    expect(response.status).toBe(404);
    expect(json).toEqual({ detail: 'Not Found', code: 'NOT_FOUND' });
    await cleanupTestContext(ctx);
  });
});
