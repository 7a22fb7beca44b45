/**
 * Newline-delimited JSON framing
 */

import { isJSONObject } from './base.js';

/**
 * Accumulates text chunks and hands back complete lines.
 * A trailing fragment without a newline stays buffered for the next chunk.
 */
export class LineBuffer {
  private buffer: string = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const lines: string[] = [];

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      let line = this.buffer.slice(0, newline);
      this.buffer = this.buffer.slice(newline + 1);
      if (line.endsWith('\r')) {
        line = line.slice(0, -1);
      }
      if (line !== '') {
        lines.push(line);
      }
      newline = this.buffer.indexOf('\n');
    }

    return lines;
  }

  /**
   * Text received after the last newline
   */
  pending(): string {
    return this.buffer;
  }

  clear(): void {
    this.buffer = '';
  }
}

/**
 * Parse one line as a JSON object; undefined for anything else
 */
export function decodeLine(line: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return undefined;
  }
  return isJSONObject(value) ? value : undefined;
}

/**
 * Serialize one message as a single line
 */
export function encodeLine(message: unknown): string {
  return JSON.stringify(message) + '\n';
}
