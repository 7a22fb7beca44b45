/**
 * info command
 * Server identity and capabilities from the initialize handshake
 */

import { runWithClient } from '../utils/run.js';
import type { ServerOptions } from '../utils/config.js';

export async function info(command: string[], options: ServerOptions): Promise<number> {
  return runWithClient(command, options, async (client) => ({
    kind: 'info',
    serverInfo: client.getServerInfo(),
    capabilities: client.getServerCapabilities()
  }));
}
