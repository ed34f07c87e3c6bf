/**
 * MCP Tool Factories
 */

import { createAuthStatusTool } from './auth-status.js';
import { createAuthenticateTool } from './authenticate.js';
import type { ToolFactory } from '../types.js';

export { createAuthStatusTool } from './auth-status.js';
export { createAuthenticateTool } from './authenticate.js';

/**
 * Built-in tool factories, registered before any consumer tools
 */
export function getAllToolFactories(): ToolFactory[] {
  return [createAuthStatusTool, createAuthenticateTool];
}
