/**
 * Stdio Transport Implementation
 * Communicates with MCP server via standard input/output
 */

import { spawn, type ChildProcess } from 'child_process';
import { BaseTransport } from './base.js';
import { LineBuffer, decodeLine, encodeLine } from './line-buffer.js';
import {
  ConfigurationError,
  ProcessExitedError,
  SpawnFailedError,
  TransportClosedError
} from '../errors.js';
import type {
  DiagnosticListener,
  JSONRPCMessage,
  JSONRPCParams,
  StdioDiagnostic
} from '../types.js';

/**
 * Stdio transport configuration
 */
export interface StdioTransportConfig {
  /** Command (e.g., python, node) */
  command: string;
  /** Argument list */
  args?: string[];
  /** Environment variables, merged over the parent's */
  env?: Record<string, string>;
  /** Working directory */
  cwd?: string;
  /** Receives dropped output, stderr and exit notices */
  onDiagnostic?: DiagnosticListener;
}

interface PendingRequest {
  resolve: (response: Record<string, unknown>) => void;
  reject: (error: Error) => void;
}

/**
 * Stdio transport implementation
 *
 * Requests are written to the child's stdin as one JSON document per line.
 * Lines read from stdout are matched to pending requests by id; anything
 * that is not a JSON object with a known id is dropped. When the child goes
 * away every pending request is rejected, so no caller waits on a dead
 * process.
 */
export class StdioTransport extends BaseTransport {
  private process: ChildProcess | null = null;
  private config: StdioTransportConfig;
  private lines = new LineBuffer();
  private pendingRequests: Map<number, PendingRequest> = new Map();
  private onExited: (() => void) | null = null;

  constructor(config: StdioTransportConfig) {
    super();
    if (!config.command) {
      throw new ConfigurationError('command is required');
    }
    this.config = config;
  }

  /**
   * Spawn the server process. Called by the first send if not called before.
   */
  start(): void {
    if (this.state !== 'unstarted') {
      return;
    }

    // Windows compatibility: npx/pnpm/yarn are .cmd shims
    let command = this.config.command;
    const isWindows = process.platform === 'win32';
    if (isWindows && ['npx', 'pnpm', 'yarn', 'npm'].includes(command)) {
      command += '.cmd';
    }

    const child = spawn(command, this.config.args ?? [], {
      env: { ...process.env, ...this.config.env },
      cwd: this.config.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      shell: isWindows
    });

    this.process = child;
    this.state = 'running';

    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => this.handleStdout(chunk));
    child.stdout?.on('error', (error: Error) => this.emitDiagnostic({ type: 'stdout-error', error }));

    // stderr is not part of the protocol
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (data: string) => this.emitDiagnostic({ type: 'stderr', data }));
    child.stderr?.on('error', (error: Error) => this.emitDiagnostic({ type: 'stderr-error', error }));

    child.stdin?.on('error', (error: Error) => this.emitDiagnostic({ type: 'stdin-error', error }));

    child.on('error', (error: Error) => this.handleProcessError(child, error));
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      this.emitDiagnostic({ type: 'exit', code, signal });
      this.terminate(() => new ProcessExitedError(code, signal));
    });
  }

  async sendRequest<T = unknown>(
    method: string,
    params?: JSONRPCParams
  ): Promise<T> {
    if (this.isClosed()) {
      throw new TransportClosedError();
    }
    this.start();

    const request = this.buildRequest(method, params);

    return new Promise<T>((resolve, reject) => {
      this.pendingRequests.set(request.id, {
        resolve: (response) => {
          try {
            resolve(this.extractResult<T>(response));
          } catch (error) {
            reject(error);
          }
        },
        reject
      });

      try {
        this.write(request);
      } catch (error) {
        this.pendingRequests.delete(request.id);
        reject(error);
      }
    });
  }

  async sendNotification(
    method: string,
    params?: JSONRPCParams
  ): Promise<void> {
    if (this.isClosed()) {
      throw new TransportClosedError();
    }
    this.start();
    this.write(this.buildNotification(method, params));
  }

  /**
   * Send SIGTERM and resolve once the process has exited.
   * Resolves at once if the process never started or is already gone.
   */
  async close(): Promise<void> {
    if (this.isClosed()) {
      return;
    }

    const child = this.process;
    if (this.state === 'unstarted' || !child) {
      this.state = 'closed';
      return;
    }

    this.state = 'closing';
    const exited = new Promise<void>((resolve) => {
      this.onExited = resolve;
    });
    child.kill('SIGTERM');
    await exited;
  }

  /**
   * Number of requests still waiting for a response
   */
  getPendingCount(): number {
    return this.pendingRequests.size;
  }

  private write(message: JSONRPCMessage): void {
    const stdin = this.process?.stdin;
    if (!stdin || !stdin.writable) {
      throw new TransportClosedError();
    }
    stdin.write(encodeLine(message));
  }

  private handleStdout(chunk: string): void {
    for (const line of this.lines.push(chunk)) {
      this.handleLine(line);
    }
  }

  private handleLine(line: string): void {
    const message = decodeLine(line);
    if (!message) {
      this.emitDiagnostic({ type: 'malformed', line });
      return;
    }

    const id = message.id;
    if (id === undefined || id === null) {
      this.emitDiagnostic({ type: 'no-id', message });
      return;
    }

    const pending = typeof id === 'number' ? this.pendingRequests.get(id) : undefined;
    if (typeof id !== 'number' || !pending) {
      this.emitDiagnostic({ type: 'unknown-id', id });
      return;
    }

    this.pendingRequests.delete(id);
    pending.resolve(message);
  }

  private handleProcessError(child: ChildProcess, error: Error): void {
    // No pid means the process never started; 'close' may not follow
    if (child.pid === undefined) {
      this.terminate(() => new SpawnFailedError(error));
      return;
    }
    this.emitDiagnostic({ type: 'process-error', error });
  }

  private terminate(createError: () => Error): void {
    this.state = 'closed';

    // An unterminated last line is never delivered
    const rest = this.lines.pending();
    this.lines.clear();
    if (rest.trim()) {
      this.emitDiagnostic({ type: 'malformed', line: rest });
    }

    const pending = [...this.pendingRequests.values()];
    this.pendingRequests.clear();
    for (const request of pending) {
      request.reject(createError());
    }

    const onExited = this.onExited;
    this.onExited = null;
    onExited?.();
  }

  private emitDiagnostic(diagnostic: StdioDiagnostic): void {
    this.config.onDiagnostic?.(diagnostic);
  }
}
