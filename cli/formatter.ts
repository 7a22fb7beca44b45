/**
 * Output formatting
 * Two modes: JSON (for tools and agents) and human-readable
 */

import chalk from 'chalk';
import type {
  CallToolResult,
  GetPromptResult,
  Implementation,
  Prompt,
  ReadResourceResult,
  Resource,
  ServerCapabilities,
  StdioDiagnostic,
  Tool
} from '../src/types.js';

/**
 * Payload of a successful command
 */
export type ResponseData =
  | { kind: 'info'; serverInfo: Implementation | null; capabilities: ServerCapabilities | null }
  | { kind: 'tools'; tools: Tool[] }
  | { kind: 'call'; tool: string; result: CallToolResult }
  | { kind: 'prompts'; prompts: Prompt[] }
  | { kind: 'prompt'; prompt: string; result: GetPromptResult }
  | { kind: 'resources'; resources: Resource[] }
  | { kind: 'read'; uri: string; result: ReadResourceResult }
  | { kind: 'ping'; ok: true };

/**
 * API response
 */
export interface ApiResponse {
  success: boolean;
  error?: string;
  data?: ResponseData;
}

/**
 * Output formatter
 */
export class OutputFormatter {
  /**
   * Print a response
   * @param resp API response
   * @param jsonMode JSON mode
   */
  static printResponse(resp: ApiResponse, jsonMode: boolean = false): void {
    if (jsonMode) {
      console.log(JSON.stringify(resp));
      return;
    }

    if (!resp.success || !resp.data) {
      console.error(chalk.red('✗'), resp.error || 'Unknown error');
      return;
    }

    for (const line of OutputFormatter.formatData(resp.data)) {
      console.log(line);
    }
  }

  /**
   * Human-readable lines for a payload
   */
  static formatData(data: ResponseData): string[] {
    switch (data.kind) {
      case 'info': {
        const name = data.serverInfo?.name ?? 'unknown';
        const version = data.serverInfo?.version ?? '?';
        const capabilities = Object.keys(data.capabilities ?? {});
        return [
          `${chalk.green('✓')} ${name} (${version})`,
          `  Capabilities: ${capabilities.length > 0 ? capabilities.join(', ') : 'none'}`
        ];
      }

      case 'tools':
        return [
          `${chalk.blue('📋')} Available tools (${data.tools.length}):`,
          ...data.tools.map((tool) => `  - ${chalk.cyan(tool.name)} : ${tool.description || 'No description'}`)
        ];

      case 'prompts':
        return [
          `${chalk.blue('📋')} Available prompts (${data.prompts.length}):`,
          ...data.prompts.map((prompt) => `  - ${chalk.cyan(prompt.name)} : ${prompt.description || 'No description'}`)
        ];

      case 'resources':
        return [
          `${chalk.blue('📋')} Available resources (${data.resources.length}):`,
          ...data.resources.map((resource) => `  - ${chalk.cyan(resource.uri)} : ${resource.name}`)
        ];

      case 'call': {
        const mark = data.result.isError ? chalk.red('✗') : chalk.green('✓');
        const lines = [`${mark} Called ${data.tool}`];
        for (const item of data.result.content ?? []) {
          lines.push(item.type === 'text' ? `  Result: ${item.text}` : `  ${item.type}: ${JSON.stringify(item)}`);
        }
        return lines;
      }

      case 'prompt': {
        const lines = [`${chalk.green('✓')} Prompt ${data.prompt}`];
        if (data.result.description) {
          lines.push(`  ${chalk.gray(data.result.description)}`);
        }
        for (const message of data.result.messages) {
          const content = message.content;
          const text = content.type === 'text' ? content.text : JSON.stringify(content);
          lines.push(`  [${message.role}] ${text}`);
        }
        return lines;
      }

      case 'read': {
        const lines = [`${chalk.green('✓')} ${data.uri}`];
        for (const content of data.result.contents) {
          lines.push('text' in content && typeof content.text === 'string'
            ? `  ${content.text}`
            : `  (${content.mimeType ?? 'binary'} content)`);
        }
        return lines;
      }

      case 'ping':
        return [`${chalk.green('✓')} Server is responding`];
    }
  }

  /**
   * Print a stdio diagnostic on stderr (--verbose)
   */
  static printDiagnostic(diagnostic: StdioDiagnostic): void {
    console.error(chalk.gray(OutputFormatter.formatDiagnostic(diagnostic)));
  }

  static formatDiagnostic(diagnostic: StdioDiagnostic): string {
    switch (diagnostic.type) {
      case 'malformed':
        return `[stdio] dropped malformed line: ${diagnostic.line}`;
      case 'no-id':
        return `[stdio] dropped message without id: ${JSON.stringify(diagnostic.message)}`;
      case 'unknown-id':
        return `[stdio] dropped response for unknown request: ${String(diagnostic.id)}`;
      case 'stderr':
        return `[stderr] ${diagnostic.data.trimEnd()}`;
      case 'stdout-error':
        return `[stdio] stdout error: ${diagnostic.error.message}`;
      case 'stderr-error':
        return `[stdio] stderr error: ${diagnostic.error.message}`;
      case 'stdin-error':
        return `[stdio] stdin error: ${diagnostic.error.message}`;
      case 'process-error':
        return `[stdio] process error: ${diagnostic.error.message}`;
      case 'exit':
        return `[stdio] server exited: code=${diagnostic.code}, signal=${diagnostic.signal}`;
    }
  }
}
