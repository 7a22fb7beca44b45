/**
 * In-process Transport Implementation
 * Calls `handle` directly on a server object living in the same process
 */

import { BaseTransport, isJSONObject } from './base.js';
import {
  AsyncToolError,
  ConfigurationError,
  MalformedResponseError,
  MCPErrorType
} from '../errors.js';
import type { InProcessServer, JSONRPCParams } from '../types.js';

/**
 * In-process transport configuration
 */
export interface InProcessTransportConfig {
  /** Server object exposing handle(request, context) */
  server: InProcessServer;
}

/**
 * In-process transport implementation
 */
export class InProcessTransport extends BaseTransport {
  private server: InProcessServer;

  constructor(config: InProcessTransportConfig) {
    super();
    if (!config.server) {
      throw new ConfigurationError('server is required');
    }
    this.server = config.server;
  }

  async sendRequest<T = unknown>(
    method: string,
    params?: JSONRPCParams
  ): Promise<T> {
    this.markRunning();

    const request = this.buildRequest(method, params);
    let response: unknown = this.server.handle(request, {});

    // Async tools return a promise; wait for it before reading the response
    if (isPromiseLike(response)) {
      try {
        response = await response;
      } catch (error) {
        throw new AsyncToolError(error);
      }
    }

    return this.processResponse<T>(response);
  }

  async sendNotification(
    method: string,
    params?: JSONRPCParams
  ): Promise<void> {
    this.markRunning();

    const result = this.server.handle(this.buildNotification(method, params), {});
    if (isPromiseLike(result)) {
      // no response to report a rejection to
      void result.then(undefined, () => undefined);
    }
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  private markRunning(): void {
    if (this.state === 'unstarted') {
      this.state = 'running';
    }
  }

  private processResponse<T>(response: unknown): T {
    if (!response) {
      throw new MalformedResponseError(MCPErrorType.NoResponse);
    }
    if (!isJSONObject(response)) {
      throw new MalformedResponseError(MCPErrorType.InvalidResponse);
    }
    return this.extractResult<T>(response);
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
