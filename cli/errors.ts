/**
 * Structured CLI errors
 * Error type + context + a user-facing format()
 */

/**
 * Error types
 */
export enum ErrorType {
  MissingArguments = 'missing_arguments',
  InvalidParams = 'invalid_params',
  ServerNotFound = 'server_not_found',
  ConfigInvalid = 'config_invalid'
}

/**
 * Base command error class
 */
export class CommandError extends Error {
  constructor(
    public readonly type: ErrorType,
    public readonly context: Record<string, string | string[]>,
    message?: string
  ) {
    super(message || `Command error: ${type}`);
    this.name = 'CommandError';
    Error.captureStackTrace(this, this.constructor);
  }

  format(): string {
    switch (this.type) {
      case ErrorType.MissingArguments:
        return `Missing arguments for: ${this.context.context}\nUsage: mcp-client ${this.context.usage}`;

      case ErrorType.ServerNotFound: {
        const servers = this.context.available_servers;
        const available = Array.isArray(servers) && servers.length > 0 ? servers.join(', ') : 'none';
        return `Server not found: ${this.context.server}\nAvailable servers: ${available}`;
      }

      case ErrorType.InvalidParams:
        return `Invalid parameters: ${this.context.reason}`;

      case ErrorType.ConfigInvalid:
        return `Cannot load MCP servers config ${this.context.path}: ${this.context.reason}`;

      default:
        return this.message || 'Unknown error';
    }
  }
}

/**
 * No server selected
 */
export class MissingArgumentsError extends CommandError {
  constructor(context: string, usage: string) {
    super(
      ErrorType.MissingArguments,
      { context, usage },
      `Missing arguments for: ${context}`
    );
  }
}

/**
 * Server name not present in the config file
 */
export class ServerNotFoundError extends CommandError {
  constructor(server: string, availableServers: string[]) {
    super(
      ErrorType.ServerNotFound,
      { server, available_servers: availableServers },
      `Server not found: ${server}`
    );
  }
}

/**
 * Option value that is not valid JSON (or not an object)
 */
export class InvalidParamsError extends CommandError {
  constructor(reason: string) {
    super(ErrorType.InvalidParams, { reason }, `Invalid parameters: ${reason}`);
  }
}

/**
 * Config file unreadable or malformed
 */
export class ConfigInvalidError extends CommandError {
  constructor(path: string, reason: string) {
    super(ErrorType.ConfigInvalid, { path, reason }, `Invalid config ${path}: ${reason}`);
  }
}
