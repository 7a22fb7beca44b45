/**
 * MCP Client - main client class
 *
 * Drives the initialize handshake and forwards the MCP method families
 * (tools, prompts, resources, ping) over whichever transport the
 * configuration selects:
 * - inprocess: direct calls to a server object's handle()
 * - stdio: JSON-RPC over a subprocess's stdin/stdout
 *
 * The same async API works for both.
 */

import { TransportType } from './types.js';
import type {
  CallToolResult,
  GetPromptResult,
  Implementation,
  InitializeResult,
  ListPromptsResult,
  ListResourcesResult,
  ListToolsResult,
  MCPClientConfig,
  Prompt,
  ReadResourceResult,
  Resource,
  ServerCapabilities,
  Tool
} from './types.js';
import { ConfigurationError } from './errors.js';
import {
  BaseTransport,
  InProcessTransport,
  StdioTransport
} from './transports/index.js';

/**
 * Protocol version sent in the initialize handshake
 */
export const PROTOCOL_VERSION = '2025-11-25';

/**
 * Default client identity sent in the initialize handshake
 */
export const DEFAULT_CLIENT_INFO: Implementation = {
  name: 'mcp-async-client',
  version: '0.1.0'
};

/**
 * MCP Client class
 */
export class MCPClient {
  private transport: BaseTransport | null = null;
  private config: MCPClientConfig;
  private _initialized: boolean = false;
  private _serverInfo: Implementation | null = null;
  private _serverCapabilities: ServerCapabilities | null = null;

  constructor(config: MCPClientConfig) {
    this.config = config;
  }

  /**
   * Create transport instance
   * Uses `type` when given, otherwise infers it from server / command / url
   */
  private createTransport(): BaseTransport {
    let type = this.config.type?.toLowerCase();

    if (!type) {
      if (this.config.server) {
        type = TransportType.INPROCESS;
      } else if (this.config.command) {
        type = TransportType.STDIO;
      } else if (this.config.url) {
        type = TransportType.HTTP;
      } else {
        throw new ConfigurationError('Must provide server, command, or url');
      }
    }

    switch (type) {
      case TransportType.INPROCESS:
        if (!this.config.server) {
          throw new ConfigurationError('inprocess transport requires server parameter');
        }
        return new InProcessTransport({ server: this.config.server });

      case TransportType.STDIO:
        if (!this.config.command) {
          throw new ConfigurationError('stdio transport requires command parameter');
        }
        return new StdioTransport({
          command: this.config.command,
          args: this.config.args,
          env: this.config.env,
          cwd: this.config.cwd,
          onDiagnostic: this.config.onDiagnostic
        });

      case TransportType.HTTP:
        throw new ConfigurationError('HTTP transport not yet implemented');

      default:
        throw new ConfigurationError(
          `Unsupported transport type: ${type}. Supported types: inprocess, stdio`
        );
    }
  }

  /**
   * The transport, created on first use
   */
  getTransport(): BaseTransport {
    if (!this.transport) {
      this.transport = this.createTransport();
    }
    return this.transport;
  }

  // ========== Handshake ==========

  /**
   * Send the initialize handshake
   *
   * Records the server's identity and capabilities, then sends
   * `notifications/initialized`. The notification has been transmitted by
   * the time this resolves, so it always precedes later requests.
   */
  async initialize(): Promise<InitializeResult | undefined> {
    const transport = this.getTransport();

    const result = await transport.sendRequest<InitializeResult | undefined>('initialize', {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: this.config.clientInfo ?? DEFAULT_CLIENT_INFO
    });

    this._serverInfo = result?.serverInfo ?? null;
    this._serverCapabilities = result?.capabilities ?? null;
    this._initialized = true;

    await transport.sendNotification('notifications/initialized');

    return result;
  }

  isInitialized(): boolean {
    return this._initialized;
  }

  /**
   * Server identity from the initialize response
   */
  getServerInfo(): Implementation | null {
    return this._serverInfo;
  }

  /**
   * Server capabilities from the initialize response
   */
  getServerCapabilities(): ServerCapabilities | null {
    return this._serverCapabilities;
  }

  // ========== Tools ==========

  async listTools(): Promise<Tool[]> {
    const result = await this.getTransport().sendRequest<ListToolsResult | undefined>('tools/list');
    return result?.tools ?? [];
  }

  /**
   * Call MCP tool
   *
   * @param toolName - Tool name
   * @param args - Tool arguments
   */
  async callTool(
    toolName: string,
    args: Record<string, unknown> = {}
  ): Promise<CallToolResult> {
    return this.getTransport().sendRequest<CallToolResult>('tools/call', {
      name: toolName,
      arguments: args
    });
  }

  // ========== Prompts ==========

  async listPrompts(): Promise<Prompt[]> {
    const result = await this.getTransport().sendRequest<ListPromptsResult | undefined>('prompts/list');
    return result?.prompts ?? [];
  }

  async getPrompt(
    promptName: string,
    args: Record<string, string> = {}
  ): Promise<GetPromptResult> {
    return this.getTransport().sendRequest<GetPromptResult>('prompts/get', {
      name: promptName,
      arguments: args
    });
  }

  // ========== Resources ==========

  async listResources(): Promise<Resource[]> {
    const result = await this.getTransport().sendRequest<ListResourcesResult | undefined>('resources/list');
    return result?.resources ?? [];
  }

  async readResource(uri: string): Promise<ReadResourceResult> {
    return this.getTransport().sendRequest<ReadResourceResult>('resources/read', { uri });
  }

  // ========== Lifecycle ==========

  /**
   * Check that the server responds
   */
  async ping(): Promise<true> {
    await this.getTransport().sendRequest('ping');
    return true;
  }

  /**
   * Close the transport. For stdio this terminates the server process
   * and resolves once it has exited.
   */
  async shutdown(): Promise<true> {
    if (this.transport) {
      await this.transport.close();
    }
    return true;
  }
}

// ========== Convenience Functions ==========

/**
 * Create an MCP client and run the initialize handshake
 *
 * @param config - Client configuration
 * @returns Initialized MCPClient instance
 */
export async function createClient(config: MCPClientConfig): Promise<MCPClient> {
  const client = new MCPClient(config);
  await client.initialize();
  return client;
}
