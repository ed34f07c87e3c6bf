/**
 * MCP Layer Types
 *
 * AuthContext is imported from core, never defined here, so dependencies
 * only point from the MCP layer into core.
 */

import type { z } from 'zod';
import type { AuthContext } from '../core/context.js';
import type { Session } from '../core/types.js';

// ============================================================================
// LLM Response Standards
// ============================================================================

/**
 * Success response returned by every tool handler
 *
 * @example
 * ```typescript
 * return { status: 'success', data: { valid: true, severity: 'ok' } };
 * ```
 */
export interface LLMSuccessResponse<T = unknown> {
  status: 'success';
  data: T;
}

/**
 * Failure response. `code` is an AuthErrorCode for authentication
 * failures, SERVER_ERROR for anything unexpected.
 */
export interface LLMFailureResponse {
  status: 'failure';
  code: string;
  message: string;
}

export type LLMResponse<T = unknown> = LLMSuccessResponse<T> | LLMFailureResponse;

// ============================================================================
// Tool Handler Types
// ============================================================================

/**
 * Per-call context handed to tool handlers
 */
export interface ToolContext {
  /** Present for tools registered with `requiresSession: true` */
  session?: Session;
}

export type ToolHandler = (
  params: Record<string, unknown>,
  context: ToolContext
) => Promise<LLMResponse>;

export interface ToolRegistration {
  /** Tool name (unique identifier) */
  name: string;

  /** Tool description for LLM */
  description: string;

  /** Zod schema for parameter validation */
  schema: z.AnyZodObject;

  handler: ToolHandler;

  /**
   * Authenticate before the handler runs and pass the Session in the
   * context. An authentication failure is returned as the tool result.
   */
  requiresSession?: boolean;
}

/**
 * Creates a tool registration with the AuthContext injected
 *
 * @example
 * ```typescript
 * export const createActivitiesTool: ToolFactory = (context) => ({
 *   name: 'list-activities',
 *   description: 'List recent activities',
 *   schema: z.object({ limit: z.number().int().default(10) }),
 *   requiresSession: true,
 *   handler: async (params, { session }) => ({
 *     status: 'success',
 *     data: await fetchActivities(session, params),
 *   }),
 * });
 * ```
 */
export type ToolFactory = (context: AuthContext) => ToolRegistration;

/**
 * MCP protocol result: a single JSON text block
 */
export interface ToolResult {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

// ============================================================================
// Server Types
// ============================================================================

export type MCPTransport = 'stdio' | 'httpStream';

export interface MCPStartOptions {
  /** Transport override (default: from configuration) */
  transport?: MCPTransport;

  /** Port override for httpStream */
  port?: number;

  /** Path of a .env file to load before configuration (default: ./.env) */
  envFile?: string;

  /** Skip the authentication attempt at startup */
  skipInitialAuth?: boolean;
}
