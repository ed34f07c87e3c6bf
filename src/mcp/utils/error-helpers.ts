/**
 * Error Handling Utilities for MCP Tools
 *
 * AuthErrors reach the client with their code and message, since those
 * carry the operator instructions (which MFA source to use, how long to
 * wait). Anything else is logged in full and masked as SERVER_ERROR.
 */

import type { LLMFailureResponse, LLMResponse, ToolResult } from '../types.js';
import { AuthError, sanitizeError } from '../../utils/errors.js';

export function handleToolError(error: unknown, toolName: string): LLMFailureResponse {
  if (error instanceof AuthError) {
    return {
      status: 'failure',
      code: error.code,
      message: error.message,
    };
  }

  console.error(`[MCP] Tool ${toolName} failed:`, sanitizeError(error));
  return {
    status: 'failure',
    code: 'SERVER_ERROR',
    message: 'An internal processing error occurred. Check the server logs for details.',
  };
}

/**
 * Convert an LLMResponse to the MCP content format
 */
export function toToolResult(response: LLMResponse): ToolResult {
  if (response.status === 'success') {
    return {
      content: [{ type: 'text', text: JSON.stringify(response.data, null, 2) }],
    };
  }

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({ error: response.code, message: response.message }, null, 2),
      },
    ],
    isError: true,
  };
}
