/**
 * Structured errors raised by transports and the client
 */

/**
 * Error categories
 */
export enum MCPErrorType {
  TransportClosed = 'transport_closed',
  Protocol = 'protocol',
  NoResponse = 'no_response',
  InvalidResponse = 'invalid_response',
  AsyncTool = 'async_tool',
  ProcessExited = 'process_exited',
  SpawnFailed = 'spawn_failed',
  Configuration = 'configuration'
}

/**
 * Base error class
 */
export class MCPClientError extends Error {
  constructor(
    public readonly type: MCPErrorType,
    message: string,
    public readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'MCPClientError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Send attempted after close or process exit
 */
export class TransportClosedError extends MCPClientError {
  constructor() {
    super(MCPErrorType.TransportClosed, 'MCP server process has exited');
    this.name = 'TransportClosedError';
  }
}

/**
 * Server answered with a JSON-RPC error object
 */
export class RpcError extends MCPClientError {
  constructor(
    public readonly code: number,
    public readonly rpcMessage: string,
    public readonly data?: unknown
  ) {
    super(MCPErrorType.Protocol, `MCP error ${code}: ${rpcMessage}`, { code, data });
    this.name = 'RpcError';
  }
}

/**
 * In-process server returned nothing, or something that is not an object
 */
export class MalformedResponseError extends MCPClientError {
  constructor(type: MCPErrorType.NoResponse | MCPErrorType.InvalidResponse) {
    super(
      type,
      type === MCPErrorType.NoResponse
        ? 'No response from MCP server'
        : 'Invalid response from MCP server'
    );
    this.name = 'MalformedResponseError';
  }
}

/**
 * Promise returned by an in-process server rejected
 */
export class AsyncToolError extends MCPClientError {
  constructor(reason: unknown) {
    super(MCPErrorType.AsyncTool, `MCP async tool error: ${describeReason(reason)}`, { reason });
    this.name = 'AsyncToolError';
  }
}

/**
 * Server process went away while a request was outstanding
 */
export class ProcessExitedError extends MCPClientError {
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null) {
    super(
      MCPErrorType.ProcessExited,
      `MCP server process exited (code ${exitCode ?? signal ?? 'unknown'})`,
      { exitCode, signal }
    );
    this.name = 'ProcessExitedError';
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

/**
 * Server process could not be spawned
 */
export class SpawnFailedError extends MCPClientError {
  constructor(reason: unknown) {
    super(MCPErrorType.SpawnFailed, `MCP server process failed to start: ${describeReason(reason)}`, { reason });
    this.name = 'SpawnFailedError';
  }
}

/**
 * Invalid constructor or client configuration
 */
export class ConfigurationError extends MCPClientError {
  constructor(message: string) {
    super(MCPErrorType.Configuration, message);
    this.name = 'ConfigurationError';
  }
}

export function describeReason(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
