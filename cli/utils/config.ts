/**
 * Server selection for CLI commands
 *
 * A server is either named after `--` on the command line or looked up by
 * `--server <name>` in an mcp-servers.json file:
 *
 *   { "servers": { "<name>": { "command": "node", "args": ["server.js"] } } }
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { isJSONObject } from '../../src/transports/index.js';
import type { MCPClientConfig } from '../../src/types.js';
import {
  ConfigInvalidError,
  InvalidParamsError,
  MissingArgumentsError,
  ServerNotFoundError
} from '../errors.js';

/**
 * One entry under "servers"
 */
export interface ServerEntry {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Options shared by every command
 */
export interface ServerOptions {
  config?: string;
  server?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Locate the config file: explicit path first, then ./config and ./
 */
export function findConfigFile(configPath?: string, cwd: string = process.cwd()): string | undefined {
  const candidates = [
    configPath,
    join(cwd, 'config', 'mcp-servers.json'),
    join(cwd, 'mcp-servers.json')
  ];
  return candidates.find((p): p is string => p !== undefined && existsSync(p));
}

/**
 * Read and validate the "servers" map of a config file
 */
export function loadServerConfigs(configFilePath: string): Record<string, ServerEntry> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configFilePath, 'utf-8'));
  } catch (error) {
    throw new ConfigInvalidError(configFilePath, error instanceof Error ? error.message : String(error));
  }

  if (!isJSONObject(parsed) || !isJSONObject(parsed.servers)) {
    throw new ConfigInvalidError(configFilePath, 'missing "servers" object');
  }

  const servers: Record<string, ServerEntry> = {};
  for (const [name, entry] of Object.entries(parsed.servers)) {
    servers[name] = toServerEntry(configFilePath, name, entry);
  }
  return servers;
}

function toServerEntry(configFilePath: string, name: string, entry: unknown): ServerEntry {
  if (!isJSONObject(entry) || typeof entry.command !== 'string' || entry.command === '') {
    throw new ConfigInvalidError(configFilePath, `server "${name}" needs a "command" string`);
  }

  const server: ServerEntry = { command: entry.command };

  if (entry.args !== undefined) {
    if (!Array.isArray(entry.args) || !entry.args.every((arg): arg is string => typeof arg === 'string')) {
      throw new ConfigInvalidError(configFilePath, `server "${name}": "args" must be an array of strings`);
    }
    server.args = entry.args;
  }

  if (entry.env !== undefined) {
    if (!isJSONObject(entry.env)) {
      throw new ConfigInvalidError(configFilePath, `server "${name}": "env" must be an object`);
    }
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(entry.env)) {
      env[key] = String(value);
    }
    server.env = env;
  }

  if (typeof entry.cwd === 'string') {
    server.cwd = entry.cwd;
  }

  return server;
}

/**
 * Turn CLI input into a client configuration
 *
 * @param command - Words after `--` (command and its arguments)
 * @param options - Parsed command options
 */
export function resolveServerConfig(command: string[], options: ServerOptions): MCPClientConfig {
  if (command.length > 0) {
    const [executable, ...args] = command;
    return { type: 'stdio', command: executable, args };
  }

  if (!options.server) {
    throw new MissingArgumentsError(
      'server',
      '<command> [--config <path>] --server <name> | <command> -- <executable> [args...]'
    );
  }

  const configFilePath = findConfigFile(options.config);
  if (!configFilePath) {
    throw new ServerNotFoundError(options.server, []);
  }

  const servers = loadServerConfigs(configFilePath);
  const entry = servers[options.server];
  if (!entry) {
    throw new ServerNotFoundError(options.server, Object.keys(servers));
  }

  return { type: 'stdio', ...entry };
}

/**
 * Parse a JSON object option such as --params
 */
export function parseJSONObjectOption(value: string | undefined, optionName: string): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidParamsError(`${optionName} must be valid JSON`);
  }

  if (!isJSONObject(parsed)) {
    throw new InvalidParamsError(`${optionName} must be a JSON object`);
  }
  return parsed;
}
