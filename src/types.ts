/**
 * MCP client type definitions
 */

import type { Implementation } from '@modelcontextprotocol/sdk/types.js';

export type {
  Tool,
  Prompt,
  Resource,
  ListToolsResult,
  ListPromptsResult,
  ListResourcesResult,
  CallToolResult,
  GetPromptResult,
  ReadResourceResult,
  InitializeResult,
  Implementation,
  ServerCapabilities
} from '@modelcontextprotocol/sdk/types.js';

/**
 * Transport type
 */
export enum TransportType {
  INPROCESS = 'inprocess',
  STDIO = 'stdio',
  HTTP = 'http'
}

/**
 * Transport lifecycle state
 */
export type TransportState = 'unstarted' | 'running' | 'closing' | 'closed';

export type JSONRPCParams = Record<string, unknown>;

/**
 * JSON-RPC request (expects a response)
 */
export interface JSONRPCRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: JSONRPCParams;
}

/**
 * JSON-RPC notification (no id, no response)
 */
export interface JSONRPCNotification {
  jsonrpc: '2.0';
  method: string;
  params?: JSONRPCParams;
}

export type JSONRPCMessage = JSONRPCRequest | JSONRPCNotification;

export interface JSONRPCErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * JSON-RPC response
 */
export interface JSONRPCResponse<T = unknown> {
  jsonrpc: '2.0';
  id: number | string | null;
  result?: T;
  error?: JSONRPCErrorObject;
}

/**
 * Context passed as the second argument of an in-process `handle` call
 */
export type HandleContext = Record<string, unknown>;

/**
 * A server living in the same process.
 *
 * `handle` receives a JSON-RPC message and returns the JSON-RPC response,
 * or a promise-like value of one when the server does async work. The
 * return type is left open: the transport validates whatever comes back.
 */
export interface InProcessServer {
  handle(request: JSONRPCMessage, context: HandleContext): unknown;
}

/**
 * Something the stdio transport observed and dropped
 */
export type StdioDiagnostic =
  | { type: 'malformed'; line: string }
  | { type: 'no-id'; message: Record<string, unknown> }
  | { type: 'unknown-id'; id: unknown }
  | { type: 'stderr'; data: string }
  | { type: 'stdout-error'; error: Error }
  | { type: 'stderr-error'; error: Error }
  | { type: 'stdin-error'; error: Error }
  | { type: 'process-error'; error: Error }
  | { type: 'exit'; code: number | null; signal: NodeJS.Signals | null };

export type DiagnosticListener = (diagnostic: StdioDiagnostic) => void;

/**
 * MCP client configuration
 *
 * Exactly one of `server`, `command` or `url` selects the transport
 * unless `type` names it explicitly.
 */
export interface MCPClientConfig {
  /** Transport type (inprocess, stdio, http) */
  type?: TransportType | string;
  /** In-process server object */
  server?: InProcessServer;
  /** Command to execute (for stdio) */
  command?: string;
  /** Command arguments (for stdio) */
  args?: string[];
  /** Extra environment variables (for stdio) */
  env?: Record<string, string>;
  /** Working directory of the server process (for stdio) */
  cwd?: string;
  /** HTTP endpoint URL */
  url?: string;
  /** Identity sent in the initialize handshake */
  clientInfo?: Implementation;
  /** Receives stdio diagnostics */
  onDiagnostic?: DiagnosticListener;
}
