/**
 * Shared command runner
 * Connects, initializes, runs one operation, prints, shuts down
 */

import { MCPClient } from '../../src/client.js';
import { CommandError } from '../errors.js';
import { OutputFormatter, type ApiResponse, type ResponseData } from '../formatter.js';
import { resolveServerConfig, type ServerOptions } from './config.js';

export type CommandAction = (client: MCPClient) => Promise<ResponseData>;

/**
 * Run one command against a server
 *
 * @returns Process exit code (0 on success, 1 on failure)
 */
export async function runWithClient(
  command: string[],
  options: ServerOptions,
  action: CommandAction
): Promise<number> {
  let client: MCPClient | null = null;
  let resp: ApiResponse;

  try {
    const config = resolveServerConfig(command, options);
    if (options.verbose) {
      config.onDiagnostic = OutputFormatter.printDiagnostic;
    }

    client = new MCPClient(config);
    await client.initialize();
    resp = { success: true, data: await action(client) };
  } catch (error) {
    resp = {
      success: false,
      error: error instanceof CommandError
        ? error.format()
        : error instanceof Error ? error.message : String(error)
    };
  }

  if (client) {
    await client.shutdown();
  }

  OutputFormatter.printResponse(resp, options.json);
  return resp.success ? 0 : 1;
}
