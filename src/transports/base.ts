/**
 * Transport abstract base class
 * All transport types (inprocess, stdio) must implement this interface
 */

import { RpcError } from '../errors.js';
import type {
  JSONRPCErrorObject,
  JSONRPCNotification,
  JSONRPCParams,
  JSONRPCRequest,
  TransportState
} from '../types.js';

export abstract class BaseTransport {
  private lastRequestId: number = 0;
  protected state: TransportState = 'unstarted';

  /**
   * Send JSON-RPC request and resolve with the server's result
   */
  abstract sendRequest<T = unknown>(
    method: string,
    params?: JSONRPCParams
  ): Promise<T>;

  /**
   * Send JSON-RPC notification; resolves once transmitted
   */
  abstract sendNotification(
    method: string,
    params?: JSONRPCParams
  ): Promise<void>;

  /**
   * Release transport resources. Safe to call more than once.
   */
  abstract close(): Promise<void>;

  getState(): TransportState {
    return this.state;
  }

  isClosed(): boolean {
    return this.state === 'closing' || this.state === 'closed';
  }

  /**
   * Build a request with the next id of this instance (1, 2, 3, ...)
   */
  protected buildRequest(method: string, params?: JSONRPCParams): JSONRPCRequest {
    const request: JSONRPCRequest = {
      jsonrpc: '2.0',
      id: ++this.lastRequestId,
      method
    };
    if (params !== undefined) {
      request.params = params;
    }
    return request;
  }

  protected buildNotification(method: string, params?: JSONRPCParams): JSONRPCNotification {
    const notification: JSONRPCNotification = {
      jsonrpc: '2.0',
      method
    };
    if (params !== undefined) {
      notification.params = params;
    }
    return notification;
  }

  /**
   * Extract `result` from a response object, or turn its `error` into an RpcError
   */
  protected extractResult<T>(response: Record<string, unknown>): T {
    const error = response.error;
    if (error !== undefined && error !== null) {
      const { code, message, data } = toErrorObject(error);
      throw new RpcError(code, message, data);
    }
    return response.result as T;
  }
}

function toErrorObject(error: unknown): JSONRPCErrorObject {
  if (typeof error !== 'object' || error === null) {
    return { code: 0, message: String(error) };
  }
  const code = 'code' in error && typeof error.code === 'number' ? error.code : 0;
  const message = 'message' in error ? String(error.message) : 'Unknown error';
  const data = 'data' in error ? error.data : undefined;
  return { code, message, data };
}

/**
 * True for a plain JSON object (not null, not an array)
 */
export function isJSONObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
