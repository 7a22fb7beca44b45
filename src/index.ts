/**
 * MCP async client
 *
 * One API over two transports:
 * - inprocess: direct calls to a server object in the same process
 * - stdio: newline-delimited JSON-RPC with a subprocess
 *
 * @version 0.1.0
 */

export {
  MCPClient,
  createClient,
  PROTOCOL_VERSION,
  DEFAULT_CLIENT_INFO
} from './client.js';

export { TransportType } from './types.js';

export type {
  // Core types
  MCPClientConfig,
  InProcessServer,
  HandleContext,
  TransportState,
  StdioDiagnostic,
  DiagnosticListener,

  // JSON-RPC types
  JSONRPCParams,
  JSONRPCRequest,
  JSONRPCNotification,
  JSONRPCMessage,
  JSONRPCResponse,
  JSONRPCErrorObject,

  // MCP payloads
  Tool,
  Prompt,
  Resource,
  CallToolResult,
  GetPromptResult,
  ReadResourceResult,
  InitializeResult,
  Implementation,
  ServerCapabilities
} from './types.js';

export {
  MCPErrorType,
  MCPClientError,
  TransportClosedError,
  RpcError,
  MalformedResponseError,
  AsyncToolError,
  ProcessExitedError,
  SpawnFailedError,
  ConfigurationError
} from './errors.js';

export {
  // Transport implementations
  InProcessTransport,
  StdioTransport
} from './transports/index.js';

// Export base class for extension
export { BaseTransport } from './transports/index.js';

export type {
  InProcessTransportConfig,
  StdioTransportConfig
} from './transports/index.js';
