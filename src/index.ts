// Main export file - re-exports all public APIs

// Core layer exports
export * from './core/index.js';

// MFA resolution
export * from './mfa/index.js';

// Notifications
export * from './notifications/index.js';

// MCP layer exports
export * from './mcp/index.js';

// Configuration exports
export * from './config/index.js';

// Utility exports
export * from './utils/errors.js';
export { sleep, withTimeout, fetchWithTimeout, TimeoutError } from './utils/timing.js';
export type { Sleep } from './utils/timing.js';
