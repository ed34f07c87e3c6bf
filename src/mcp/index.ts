/**
 * MCP Layer Public API
 */

export { FitnessAuthServer } from './server.js';
export type { FitnessAuthServerOptions } from './server.js';
export { ContextBuilder } from './context-builder.js';
export type { ContextBuilderOptions } from './context-builder.js';
export { executeTool } from './tool-runner.js';
export { handleToolError, toToolResult } from './utils/error-helpers.js';
export { getAllToolFactories, createAuthStatusTool, createAuthenticateTool } from './tools/index.js';
export type {
  LLMResponse,
  LLMSuccessResponse,
  LLMFailureResponse,
  ToolContext,
  ToolHandler,
  ToolRegistration,
  ToolFactory,
  ToolResult,
  MCPTransport,
  MCPStartOptions,
} from './types.js';
