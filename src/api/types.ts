/**
 * API Types and Request Schemas
 *
 * Wire-level types for the HTTP surface. Request bodies, query strings and
 * path parameters are described with Zod schemas so the same definition
 * validates input and types the handler. JSON field names are snake_case.
 *
 * @example
 * ```typescript
 * // Success: the resource itself
 * { "id": 1, "email": "ada@example.com", "username": "ada", "full_name": null, "is_active": true }
 *
 * // Error
 * { "detail": "User 99999 not found", "code": "NOT_FOUND" }
 * ```
 */

import { z } from 'zod';
import type { User } from '../core/models';

// ============================================================================
// Error Response Types
// ============================================================================

/**
 * One field-level validation failure.
 */
export interface ValidationErrorDetail {
  /** Dot-separated path to the offending field (e.g. 'email') */
  path: string;
  /** What was wrong with it */
  message: string;
}

/**
 * Body of every error response.
 */
export interface ApiErrorResponse {
  /** Human-readable message */
  detail: string;
  /** Stable machine-readable reason (see ErrorCodes) */
  code: string;
  /** Field-level failures, present on validation errors */
  errors?: unknown;
  /** Stack trace or raw error, outside production only */
  debug?: unknown;
}

// ============================================================================
// Users
// ============================================================================

/**
 * POST /v1/users body. Email and username are stored as given; the only
 * limit is the 255-character width of the PostgreSQL columns.
 */
export const createUserSchema = z.object({
  email: z.string().max(255),
  username: z.string().max(255),
  full_name: z.string().max(255).nullable().optional(),
  is_active: z.boolean().default(true),
});

export type CreateUserBody = z.infer<typeof createUserSchema>;

/**
 * GET /v1/users query string. Negative values are refused here because
 * PostgreSQL rejects a negative OFFSET or LIMIT.
 */
export const listUsersQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(0).default(100),
});

/**
 * Path parameter for routes addressing one user.
 */
export const userIdParamsSchema = z.object({
  id: z.coerce.number().int(),
});

/**
 * User as returned by the API.
 */
export interface UserResponse {
  id: number;
  email: string;
  username: string;
  full_name: string | null;
  is_active: boolean;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    email: user.email,
    username: user.username,
    full_name: user.fullName,
    is_active: user.isActive,
  };
}

// ============================================================================
// Items
// ============================================================================

export const itemParamsSchema = z.object({
  itemId: z.coerce.number().int(),
});

export const itemQuerySchema = z.object({
  q: z.string().optional(),
});

export interface ItemResponse {
  item_id: number;
  q: string | null;
}
