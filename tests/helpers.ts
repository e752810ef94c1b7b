/**
 * Test Helpers Module
 *
 * Utility functions for requests, fixtures and temporary state. The state
 * helpers always put back what they changed, even when the body throws.
 */

import type { Hono } from 'hono';
import type { TokenStore } from '../src/core/auth';
import type { User } from '../src/core/models';
import { withSession } from '../src/storage';
import type { TestContext } from './setup';

// ============================================================================
// Requests
// ============================================================================

/**
 * Authorization header carrying the given bearer token.
 */
export function createAuthHeader(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

/**
 * Sends a JSON body to the app.
 */
export async function postJson(
  app: Hono,
  path: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

/**
 * Extracts JSON response from a Hono Response object.
 *
 * @param response - Hono Response object
 * @returns Parsed JSON body
 */
export async function getJsonResponse<T>(response: Response): Promise<T> {
  return response.json() as Promise<T>;
}

// ============================================================================
// Temporary State
// ============================================================================

/**
 * Runs `body` while the store accepts exactly `tokens` (`null` empties it),
 * then restores the previous tokens.
 *
 * @example
 * ```typescript
 * await withTemporaryTokens(ctx.tokenStore, null, async () => {
 *   const res = await app.request('/v1/protected/', { headers });
 *   expect(res.status).toBe(500);
 * });
 * ```
 */
export async function withTemporaryTokens<T>(
  store: TokenStore,
  tokens: Iterable<string> | null,
  body: () => Promise<T> | T
): Promise<T> {
  const previous = store.snapshot();
  store.replace(tokens);
  try {
    return await body();
  } finally {
    store.restore(previous);
  }
}

/**
 * Runs `body` with the given environment variables set (`undefined` unsets),
 * then restores their previous values.
 */
export async function withEnv<T>(
  vars: Record<string, string | undefined>,
  body: () => Promise<T> | T
): Promise<T> {
  const previous: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(vars)) {
    previous[name] = process.env[name];
    setEnv(name, value);
  }
  try {
    return await body();
  } finally {
    for (const [name, value] of Object.entries(previous)) {
      setEnv(name, value);
    }
  }
}

function setEnv(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

// ============================================================================
// Fixtures
// ============================================================================

let userCounter = 0;

/**
 * Inserts a user straight through the persistence gateway. Email and
 * username are unique per call unless overridden.
 */
export async function createTestUser(
  ctx: TestContext,
  overrides: Partial<Omit<User, 'id'>> = {}
): Promise<User> {
  userCounter += 1;
  return withSession(ctx.gateway, (session) =>
    session.users.create({
      email: `user${userCounter}@example.com`,
      username: `user${userCounter}`,
      fullName: null,
      isActive: true,
      ...overrides,
    })
  );
}
