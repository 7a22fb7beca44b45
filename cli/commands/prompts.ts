/**
 * prompts / prompt commands
 */

import { runWithClient } from '../utils/run.js';
import { parseJSONObjectOption, type ServerOptions } from '../utils/config.js';
import { InvalidParamsError } from '../errors.js';

export async function prompts(command: string[], options: ServerOptions): Promise<number> {
  return runWithClient(command, options, async (client) => ({
    kind: 'prompts',
    prompts: await client.listPrompts()
  }));
}

export interface PromptOptions extends ServerOptions {
  args?: string;
}

export async function prompt(name: string, command: string[], options: PromptOptions): Promise<number> {
  return runWithClient(command, options, async (client) => {
    const args: Record<string, string> = {};
    for (const [key, value] of Object.entries(parseJSONObjectOption(options.args, '--args'))) {
      if (typeof value !== 'string') {
        throw new InvalidParamsError(`--args value for "${key}" must be a string`);
      }
      args[key] = value;
    }
    return { kind: 'prompt', prompt: name, result: await client.getPrompt(name, args) };
  });
}
