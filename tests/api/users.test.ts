/**
 * Users API Endpoint Tests
 *
 * Tests for the users CRUD endpoints against an in-memory database.
 *
 * Endpoints tested:
 * - POST /v1/users - Create a user
 * - GET /v1/users/:id - Get one user
 * - GET /v1/users - List users with skip/limit
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ApiErrorResponse, UserResponse } from '../../src/api/types';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';
import { createTestUser, getJsonResponse, postJson } from '../helpers';

describe('Users API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestContext({ database: true });
  });

  afterEach(async () => {
    await cleanupTestContext(ctx);
  });

  // ==========================================================================
  // POST /v1/users
  // ==========================================================================
  describe('POST /v1/users', () => {
    it('should create a user and return 201', async () => {
      // Arrange
      const input = { email: 'ada@example.com', username: 'ada', full_name: 'Ada Lovelace' };

      // Act
      const response = await postJson(ctx.app, '/v1/users/', input);
      const json = await getJsonResponse<UserResponse>(response);

      // Assert
      expect(response.status).toBe(201);
      expect(json).toEqual({
        id: 1,
        email: 'ada@example.com',
        username: 'ada',
        full_name: 'Ada Lovelace',
        is_active: true,
      });
    });

    it('should default full_name to null and keep is_active when given', async () => {
      const response = await postJson(ctx.app, '/v1/users', {
        email: 'grace@example.com',
        username: 'grace',
        is_active: false,
      });
      const json = await getJsonResponse<UserResponse>(response);

      expect(response.status).toBe(201);
      expect(json.full_name).toBeNull();
      expect(json.is_active).toBe(false);
    });

    it('should reject a taken email', async () => {
      // Arrange
      await createTestUser(ctx, { email: 'ada@example.com', username: 'ada' });

      // Act
      const response = await postJson(ctx.app, '/v1/users/', {
        email: 'ada@example.com',
        username: 'someone-else',
      });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      // Assert
      expect(response.status).toBe(400);
      expect(json).toEqual({
        detail: 'User with this email or username already exists',
        code: 'CONFLICT',
      });
    });

    it('should reject a taken username', async () => {
      await createTestUser(ctx, { email: 'ada@example.com', username: 'ada' });

      const response = await postJson(ctx.app, '/v1/users/', {
        email: 'other@example.com',
        username: 'ada',
      });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(400);
      expect(json.code).toBe('CONFLICT');
    });

    it('should reject a body missing required fields with 422 and field errors', async () => {
      // Act
      const response = await postJson(ctx.app, '/v1/users/', { full_name: 'Ada Lovelace' });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      // Assert
      expect(response.status).toBe(422);
      expect(json.code).toBe('VALIDATION_ERROR');
      expect(json.detail).toBe('Invalid request body');
      expect(Array.isArray(json.errors)).toBe(true);

      const paths = Array.isArray(json.errors)
        ? json.errors.map((e: { path: string }) => e.path)
        : [];
      expect(paths).toEqual(['email', 'username']);
    });

    it('should store email and username as given', async () => {
      // Act
      const response = await postJson(ctx.app, '/v1/users/', {
        email: 'not-an-email',
        username: ' ada ',
      });
      const json = await getJsonResponse<UserResponse>(response);

      // Assert
      expect(response.status).toBe(201);
      expect(json.email).toBe('not-an-email');
      expect(json.username).toBe(' ada ');
    });

    it('should reject a username longer than the column', async () => {
      const response = await postJson(ctx.app, '/v1/users/', {
        email: 'ada@example.com',
        username: 'a'.repeat(256),
      });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(422);
      expect(json.detail).toBe('Invalid request body');
    });

    it('should reject malformed JSON', async () => {
      // Act
      const response = await ctx.app.request('/v1/users/', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"email": ',
      });
      const json = await getJsonResponse<ApiErrorResponse>(response);

      // Assert
      expect(response.status).toBe(422);
      expect(json).toEqual({ detail: 'Request body must be valid JSON', code: 'INVALID_JSON' });
    });
  });

  // ==========================================================================
  // GET /v1/users/:id
  // ==========================================================================
  describe('GET /v1/users/:id', () => {
    it('should return the user', async () => {
      // Arrange
      const user = await createTestUser(ctx, { username: 'ada', email: 'ada@example.com' });

      // Act
      const response = await ctx.app.request(`/v1/users/${user.id}`);
      const json = await getJsonResponse<UserResponse>(response);

      // Assert
      expect(response.status).toBe(200);
      expect(json).toEqual({
        id: user.id,
        email: 'ada@example.com',
        username: 'ada',
        full_name: null,
        is_active: true,
      });
    });

    it('should return 404 for a missing user', async () => {
      const response = await ctx.app.request('/v1/users/99999');
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(404);
      expect(json).toEqual({ detail: 'User 99999 not found', code: 'NOT_FOUND' });
    });

    it('should reject a non-integer id', async () => {
      const response = await ctx.app.request('/v1/users/abc');
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(422);
      expect(json.code).toBe('VALIDATION_ERROR');
    });
  });

  // ==========================================================================
  // GET /v1/users
  // ==========================================================================
  describe('GET /v1/users', () => {
    it('should return an empty list when there are no users', async () => {
      const response = await ctx.app.request('/v1/users/');

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual([]);
    });

    it('should page through users ordered by id', async () => {
      // Arrange
      for (let i = 0; i < 5; i++) {
        await createTestUser(ctx);
      }

      // Act
      const response = await ctx.app.request('/v1/users/?skip=2&limit=2');
      const json = await getJsonResponse<UserResponse[]>(response);

      // Assert
      expect(response.status).toBe(200);
      expect(json.map((u) => u.id)).toEqual([3, 4]);
    });

    it('should treat the path with and without a trailing slash the same', async () => {
      await createTestUser(ctx);

      const withSlash = await getJsonResponse<UserResponse[]>(await ctx.app.request('/v1/users/'));
      const withoutSlash = await getJsonResponse<UserResponse[]>(await ctx.app.request('/v1/users'));

      expect(withSlash).toEqual(withoutSlash);
      expect(withSlash).toHaveLength(1);
    });

    it('should accept a limit above the default page size', async () => {
      await createTestUser(ctx);

      const response = await ctx.app.request('/v1/users/?limit=5000');
      const json = await getJsonResponse<UserResponse[]>(response);

      expect(response.status).toBe(200);
      expect(json).toHaveLength(1);
    });

    it('should reject a negative skip', async () => {
      const response = await ctx.app.request('/v1/users/?skip=-1');
      const json = await getJsonResponse<ApiErrorResponse>(response);

      expect(response.status).toBe(422);
      expect(json.detail).toBe('Invalid query parameters');
    });
  });

  // ==========================================================================
  // Sessions
  // ==========================================================================
  describe('database sessions', () => {
    it('should release the request session after success and after an error', async () => {
      await ctx.app.request('/v1/users/');
      await ctx.app.request('/v1/users/99999');

      expect(ctx.gateway.openSessions).toBe(0);
    });
  });
});

describe('Users API without a database', () => {
  it('should not be mounted', async () => {
    // Arrange
    const ctx = await createTestContext();

    // Act
    const response = await ctx.app.request('/v1/users/');
    const json = await getJsonResponse<ApiErrorResponse>(response);

    // Assert
    expect(response.status).toBe(404);
    expect(json).toEqual({ detail: 'Not Found', code: 'NOT_FOUND' });
    await cleanupTestContext(ctx);
  });
});
