/**
 * Executes a tool registration outside any transport: resolves the session
 * for session-bound tools, catches handler errors, and converts the
 * LLMResponse to MCP content.
 *
 * Session-bound tools reuse the orchestrator's current session. Only when a
 * handler fails with an upstream rejection is the session dropped and the
 * handler run once more on a fresh one.
 */

import type { AuthContext } from '../core/context.js';
import type { Session } from '../core/types.js';
import type { ToolRegistration, ToolResult } from './types.js';
import { handleToolError, toToolResult } from './utils/error-helpers.js';
import { isSessionRejected } from '../utils/errors.js';

export async function executeTool(
  tool: ToolRegistration,
  context: AuthContext,
  params: Record<string, unknown>
): Promise<ToolResult> {
  if (!tool.requiresSession) {
    try {
      return toToolResult(await tool.handler(params, {}));
    } catch (error) {
      return toToolResult(handleToolError(error, tool.name));
    }
  }

  const { orchestrator } = context;
  let session: Session;
  try {
    session = await orchestrator.getActiveSession();
  } catch (error) {
    return toToolResult(handleToolError(error, tool.name));
  }

  try {
    return toToolResult(await tool.handler(params, { session }));
  } catch (error) {
    if (!isSessionRejected(error)) {
      return toToolResult(handleToolError(error, tool.name));
    }
    console.warn(`[MCP] Session rejected during ${tool.name}, re-authenticating`);
  }

  try {
    orchestrator.invalidateSession();
    session = await orchestrator.getActiveSession();
    return toToolResult(await tool.handler(params, { session }));
  } catch (error) {
    return toToolResult(handleToolError(error, tool.name));
  }
}
