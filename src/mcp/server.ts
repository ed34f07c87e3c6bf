/**
 * Fitness Auth MCP Server
 *
 * Wrapper around FastMCP that owns the authentication lifecycle:
 * - Configuration loading (.env, environment or JSON file)
 * - AuthContext creation and validation
 * - One authentication attempt at startup (failures are logged, the server
 *   still starts so `auth-status` and `authenticate` stay reachable)
 * - Registration of the built-in auth tools and any consumer tools
 *
 * @example
 * ```typescript
 * const server = new FitnessAuthServer({ upstream: new MyFitnessClient() });
 * server.addToolFactory(createActivitiesTool);
 * await server.start({ transport: 'httpStream', port: 3000 });
 * ```
 */

import { FastMCP } from 'fastmcp';
import dotenv from 'dotenv';
import { ConfigManager } from '../config/manager.js';
import { ContextBuilder } from './context-builder.js';
import type { ContextBuilderOptions } from './context-builder.js';
import { getAllToolFactories } from './tools/index.js';
import { executeTool } from './tool-runner.js';
import type { AuthContext } from '../core/context.js';
import type { UpstreamAuthClient } from '../core/upstream.js';
import type { MCPStartOptions, ToolFactory, ToolRegistration } from './types.js';
import { errorMessage } from '../utils/errors.js';

type SemVer = `${number}.${number}.${number}`;

function isSemVer(version: string): version is SemVer {
  return /^\d+\.\d+\.\d+$/.test(version);
}

export interface FitnessAuthServerOptions {
  upstream: UpstreamAuthClient;

  /** JSON configuration file (default: CONFIG_PATH, else environment) */
  configPath?: string;

  /** Pre-built manager, e.g. with a custom environment */
  configManager?: ConfigManager;

  /** Passed through to ContextBuilder */
  overrides?: Pick<ContextBuilderOptions, 'notifier' | 'mailboxClient' | 'sleep' | 'onStateChange'>;
}

export class FitnessAuthServer {
  private readonly configManager: ConfigManager;
  private readonly upstream: UpstreamAuthClient;
  private readonly configPath?: string;
  private readonly overrides: FitnessAuthServerOptions['overrides'];
  private readonly toolFactories: ToolFactory[] = [];
  private authContext?: AuthContext;
  private mcpServer?: FastMCP;
  private isRunning = false;

  constructor(options: FitnessAuthServerOptions) {
    this.upstream = options.upstream;
    this.configPath = options.configPath;
    this.configManager = options.configManager ?? new ConfigManager();
    this.overrides = options.overrides;
  }

  /**
   * Queue a consumer tool factory. Factories receive the AuthContext when
   * the server starts; tools added after start are registered immediately.
   */
  addToolFactory(factory: ToolFactory): this {
    if (this.authContext && this.mcpServer) {
      this.registerTool(factory(this.authContext));
    } else {
      this.toolFactories.push(factory);
    }
    return this;
  }

  async start(options: MCPStartOptions = {}): Promise<void> {
    if (this.isRunning) {
      throw new Error('Server is already running. Call stop() first.');
    }

    console.log('[FitnessAuthServer] Starting server...');

    // 1. Load configuration
    dotenv.config({ path: options.envFile });
    const config = await this.configManager.loadConfig(this.configPath);

    // 2. Build AuthContext
    this.authContext = new ContextBuilder({
      configManager: this.configManager,
      upstream: this.upstream,
      ...this.overrides,
    }).buildAuthContext();

    // 3. Authenticate once so consumer tools start with a session
    if (!options.skipInitialAuth) {
      try {
        await this.authContext.orchestrator.authenticate();
        console.log('[FitnessAuthServer] ✓ Authenticated');
      } catch (error) {
        console.error(
          `[FitnessAuthServer] Initial authentication failed, tools will retry on demand: ${errorMessage(error)}`
        );
      }
    }

    // 4. Create FastMCP server
    const transport = options.transport ?? config.mcp.transport;
    const port = options.port ?? config.mcp.port;
    const version: SemVer = isSemVer(config.mcp.version) ? config.mcp.version : '1.0.0';

    this.mcpServer = new FastMCP({ name: config.mcp.serverName, version });

    // 5. Register tools
    const factories = [...getAllToolFactories(), ...this.toolFactories];
    for (const factory of factories) {
      this.registerTool(factory(this.authContext));
    }

    // 6. Start transport
    if (transport === 'httpStream') {
      await this.mcpServer.start({
        transportType: 'httpStream',
        httpStream: { port, endpoint: '/mcp' },
      });
    } else {
      await this.mcpServer.start({ transportType: 'stdio' });
    }

    this.isRunning = true;

    console.log('[FitnessAuthServer] ✓ Server started');
    console.log(`  Server Name:      ${config.mcp.serverName}`);
    console.log(`  Version:          ${version}`);
    console.log(`  Transport:        ${transport}`);
    if (transport === 'httpStream') {
      console.log(`  URL:              http://localhost:${port}/mcp`);
    }
    console.log(`  Tools Registered: ${factories.length}`);
    console.log(`  Auth State:       ${this.authContext.orchestrator.getState()}`);
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      console.log('[FitnessAuthServer] Server is not running');
      return;
    }

    if (this.mcpServer) {
      await this.mcpServer.stop();
    }

    this.authContext = undefined;
    this.mcpServer = undefined;
    this.isRunning = false;

    console.log('[FitnessAuthServer] ✓ Server stopped');
  }

  getAuthContext(): AuthContext {
    if (!this.authContext) {
      throw new Error('AuthContext not initialized. Call start() first.');
    }
    return this.authContext;
  }

  isServerRunning(): boolean {
    return this.isRunning;
  }

  getConfigManager(): ConfigManager {
    return this.configManager;
  }

  private registerTool(tool: ToolRegistration): void {
    const { mcpServer, authContext } = this;
    if (!mcpServer || !authContext) {
      throw new Error('Cannot register tool before server start.');
    }

    console.log(`[FitnessAuthServer] Registering tool: ${tool.name}`);
    mcpServer.addTool({
      name: tool.name,
      description: tool.description,
      parameters: tool.schema,
      execute: async (args) => executeTool(tool, authContext, args),
    });
  }
}
