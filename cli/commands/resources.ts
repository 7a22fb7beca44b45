/**
 * resources / read commands
 */

import { runWithClient } from '../utils/run.js';
import type { ServerOptions } from '../utils/config.js';

export async function resources(command: string[], options: ServerOptions): Promise<number> {
  return runWithClient(command, options, async (client) => ({
    kind: 'resources',
    resources: await client.listResources()
  }));
}

export async function read(uri: string, command: string[], options: ServerOptions): Promise<number> {
  return runWithClient(command, options, async (client) => ({
    kind: 'read',
    uri,
    result: await client.readResource(uri)
  }));
}
