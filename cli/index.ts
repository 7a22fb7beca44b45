#!/usr/bin/env node
/**
 * MCP client CLI
 *
 *   mcp-client tools -- node server.js
 *   mcp-client call echo --params '{"message":"hi"}' --server echo
 */

import { Command } from 'commander';
import { info } from './commands/info.js';
import { tools, call } from './commands/tools.js';
import { prompts, prompt } from './commands/prompts.js';
import { resources, read } from './commands/resources.js';
import { ping } from './commands/ping.js';

/**
 * Options every command accepts
 */
function withServerOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to mcp-servers.json configuration file')
    .option('--server <name>', 'Server name from the configuration file')
    .option('--json', 'JSON output mode')
    .option('--verbose', 'Print stdio diagnostics on stderr');
}

/**
 * Store the exit code; stdio handles close on their own once the server has exited
 */
function exitWith(code: number): void {
  process.exitCode = code;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mcp-client')
    .description('MCP client CLI - talk to an MCP server over stdio')
    .version('0.1.0');

  withServerOptions(program.command('info'))
    .description('Show server identity and capabilities')
    .argument('[command...]', 'Server command (after --)')
    .action(async (command: string[], options) => exitWith(await info(command, options)));

  withServerOptions(program.command('tools'))
    .description('List available tools')
    .argument('[command...]', 'Server command (after --)')
    .action(async (command: string[], options) => exitWith(await tools(command, options)));

  withServerOptions(program.command('call'))
    .description('Call a tool')
    .argument('<tool>', 'Tool name')
    .argument('[command...]', 'Server command (after --)')
    .option('--params <json>', 'Tool arguments (JSON object)')
    .action(async (tool: string, command: string[], options) => exitWith(await call(tool, command, options)));

  withServerOptions(program.command('prompts'))
    .description('List available prompts')
    .argument('[command...]', 'Server command (after --)')
    .action(async (command: string[], options) => exitWith(await prompts(command, options)));

  withServerOptions(program.command('prompt'))
    .description('Get a prompt')
    .argument('<name>', 'Prompt name')
    .argument('[command...]', 'Server command (after --)')
    .option('--args <json>', 'Prompt arguments (JSON object of strings)')
    .action(async (name: string, command: string[], options) => exitWith(await prompt(name, command, options)));

  withServerOptions(program.command('resources'))
    .description('List available resources')
    .argument('[command...]', 'Server command (after --)')
    .action(async (command: string[], options) => exitWith(await resources(command, options)));

  withServerOptions(program.command('read'))
    .description('Read a resource')
    .argument('<uri>', 'Resource URI')
    .argument('[command...]', 'Server command (after --)')
    .action(async (uri: string, command: string[], options) => exitWith(await read(uri, command, options)));

  withServerOptions(program.command('ping'))
    .description('Check that the server responds')
    .argument('[command...]', 'Server command (after --)')
    .action(async (command: string[], options) => exitWith(await ping(command, options)));

  return program;
}

await createProgram().parseAsync();
