/**
 * tools / call commands
 */

import { runWithClient } from '../utils/run.js';
import { parseJSONObjectOption, type ServerOptions } from '../utils/config.js';

export async function tools(command: string[], options: ServerOptions): Promise<number> {
  return runWithClient(command, options, async (client) => ({
    kind: 'tools',
    tools: await client.listTools()
  }));
}

export interface CallOptions extends ServerOptions {
  params?: string;
}

export async function call(tool: string, command: string[], options: CallOptions): Promise<number> {
  return runWithClient(command, options, async (client) => {
    const args = parseJSONObjectOption(options.params, '--params');
    return { kind: 'call', tool, result: await client.callTool(tool, args) };
  });
}
