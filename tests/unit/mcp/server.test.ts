/**
 * FitnessAuthServer Unit Tests
 *
 * FastMCP is replaced with a recorder so start() never opens a transport.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

const fastmcp = vi.hoisted(() => ({
  addTool: vi.fn(),
  start: vi.fn(async () => undefined),
  stop: vi.fn(async () => undefined),
}));

vi.mock('fastmcp', () => ({
  FastMCP: vi.fn(function () {
    return fastmcp;
  }),
}));

import { FitnessAuthServer } from '../../../src/mcp/server.js';
import { ConfigManager } from '../../../src/config/manager.js';
import type { ToolFactory } from '../../../src/mcp/types.js';
import { FakeUpstreamClient, RecordingNotificationSink } from '../../../src/testing/index.js';

const createPingTool: ToolFactory = () => ({
  name: 'ping',
  description: 'Reply with pong',
  schema: z.object({}),
  handler: async () => ({ status: 'success', data: 'pong' }),
});

describe('FitnessAuthServer', () => {
  let tempDir: string;
  let upstream: FakeUpstreamClient;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'auth-server-'));
    upstream = new FakeUpstreamClient();
    fastmcp.addTool.mockClear();
    fastmcp.start.mockClear();
    fastmcp.stop.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  function createServer(env: NodeJS.ProcessEnv = {}): FitnessAuthServer {
    return new FitnessAuthServer({
      upstream,
      configManager: new ConfigManager({
        env: {
          FITNESS_IDENTITY: 'athlete@example.com',
          FITNESS_SECRET: 'test-secret',
          TOKEN_STORE_PATH: path.join(tempDir, 'tokens'),
          AUDIT_LOG_PATH: path.join(tempDir, 'auth_log.json'),
          MFA_FILE_PATH: path.join(tempDir, 'mfa.txt'),
          ...env,
        },
      }),
      overrides: { notifier: new RecordingNotificationSink(), sleep: async () => undefined },
    });
  }

  describe('before start', () => {
    it('should not be running', () => {
      expect(createServer().isServerRunning()).toBe(false);
    });

    it('should throw from getAuthContext', () => {
      expect(() => createServer().getAuthContext()).toThrow(
        'AuthContext not initialized. Call start() first.'
      );
    });

    it('should treat stop as a no-op', async () => {
      await expect(createServer().stop()).resolves.toBeUndefined();
      expect(fastmcp.stop).not.toHaveBeenCalled();
    });
  });

  describe('start()', () => {
    it('should authenticate, register tools and start stdio', async () => {
      const server = createServer();
      server.addToolFactory(createPingTool);

      await server.start();

      expect(upstream.loginCalls).toHaveLength(1);
      expect(server.getAuthContext().orchestrator.getState()).toBe('ready');
      expect(fastmcp.addTool.mock.calls.map(([tool]) => tool.name)).toEqual([
        'auth-status',
        'authenticate',
        'ping',
      ]);
      expect(fastmcp.start).toHaveBeenCalledWith({ transportType: 'stdio' });
      expect(server.isServerRunning()).toBe(true);
    });

    it('should start even when the initial authentication fails', async () => {
      const server = createServer({ FITNESS_SECRET: '' });

      await server.start();

      expect(server.isServerRunning()).toBe(true);
      expect(server.getAuthContext().orchestrator.getState()).toBe('failed');
    });

    it('should honour transport options and skip the initial login', async () => {
      const server = createServer();

      await server.start({ transport: 'httpStream', port: 8081, skipInitialAuth: true });

      expect(upstream.loginCalls).toHaveLength(0);
      expect(fastmcp.start).toHaveBeenCalledWith({
        transportType: 'httpStream',
        httpStream: { port: 8081, endpoint: '/mcp' },
      });
    });

    it('should register factories added after start immediately', async () => {
      const server = createServer();
      await server.start({ skipInitialAuth: true });

      server.addToolFactory(createPingTool);

      expect(fastmcp.addTool).toHaveBeenCalledTimes(3);
    });

    it('should refuse a second start', async () => {
      const server = createServer();
      await server.start({ skipInitialAuth: true });

      await expect(server.start()).rejects.toThrow(
        'Server is already running. Call stop() first.'
      );
    });
  });

  describe('stop()', () => {
    it('should stop FastMCP and drop the context', async () => {
      const server = createServer();
      await server.start({ skipInitialAuth: true });

      await server.stop();

      expect(fastmcp.stop).toHaveBeenCalledTimes(1);
      expect(server.isServerRunning()).toBe(false);
      expect(() => server.getAuthContext()).toThrow();
    });
  });
});
