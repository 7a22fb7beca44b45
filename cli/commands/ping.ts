/**
 * ping command
 */

import { runWithClient } from '../utils/run.js';
import type { ServerOptions } from '../utils/config.js';

export async function ping(command: string[], options: ServerOptions): Promise<number> {
  return runWithClient(command, options, async (client) => ({
    kind: 'ping',
    ok: await client.ping()
  }));
}
