import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { OutputFormatter } from '../../../cli/formatter.js';

describe('OutputFormatter', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('formatData', () => {
    it('should format server info', () => {
      expect(OutputFormatter.formatData({
        kind: 'info',
        serverInfo: { name: 'notes', version: '1.2.0' },
        capabilities: { tools: {}, resources: {} }
      })).toEqual([
        '✓ notes (1.2.0)',
        '  Capabilities: tools, resources'
      ]);
    });

    it('should format info without capabilities', () => {
      expect(OutputFormatter.formatData({ kind: 'info', serverInfo: null, capabilities: null })).toEqual([
        '✓ unknown (?)',
        '  Capabilities: none'
      ]);
    });

    it('should list tools with descriptions', () => {
      expect(OutputFormatter.formatData({
        kind: 'tools',
        tools: [
          { name: 'search', description: 'Search notes', inputSchema: { type: 'object' } },
          { name: 'count', inputSchema: { type: 'object' } }
        ]
      })).toEqual([
        '📋 Available tools (2):',
        '  - search : Search notes',
        '  - count : No description'
      ]);
    });

    it('should list resources by uri', () => {
      expect(OutputFormatter.formatData({
        kind: 'resources',
        resources: [{ uri: 'memo://todo', name: 'todo' }]
      })).toEqual([
        '📋 Available resources (1):',
        '  - memo://todo : todo'
      ]);
    });

    it('should mark a failed tool call', () => {
      expect(OutputFormatter.formatData({
        kind: 'call',
        tool: 'search',
        result: { content: [{ type: 'text', text: 'index missing' }], isError: true }
      })).toEqual([
        '✗ Called search',
        '  Result: index missing'
      ]);
    });

    it('should format prompt messages by role', () => {
      expect(OutputFormatter.formatData({
        kind: 'prompt',
        prompt: 'greet',
        result: {
          description: 'Friendly greeting',
          messages: [{ role: 'user', content: { type: 'text', text: 'Hello, Ada' } }]
        }
      })).toEqual([
        '✓ Prompt greet',
        '  Friendly greeting',
        '  [user] Hello, Ada'
      ]);
    });

    it('should show text contents and summarize binary ones', () => {
      expect(OutputFormatter.formatData({
        kind: 'read',
        uri: 'memo://logo',
        result: {
          contents: [
            { uri: 'memo://logo', text: 'caption' },
            { uri: 'memo://logo', mimeType: 'image/png', blob: 'aGVsbG8=' }
          ]
        }
      })).toEqual([
        '✓ memo://logo',
        '  caption',
        '  (image/png content)'
      ]);
    });

    it('should format ping', () => {
      expect(OutputFormatter.formatData({ kind: 'ping', ok: true })).toEqual(['✓ Server is responding']);
    });
  });

  describe('formatDiagnostic', () => {
    it('should describe each diagnostic', () => {
      expect(OutputFormatter.formatDiagnostic({ type: 'malformed', line: 'booting' }))
        .toBe('[stdio] dropped malformed line: booting');
      expect(OutputFormatter.formatDiagnostic({ type: 'no-id', message: { jsonrpc: '2.0', method: 'note' } }))
        .toBe('[stdio] dropped message without id: {"jsonrpc":"2.0","method":"note"}');
      expect(OutputFormatter.formatDiagnostic({ type: 'unknown-id', id: 7 }))
        .toBe('[stdio] dropped response for unknown request: 7');
      expect(OutputFormatter.formatDiagnostic({ type: 'stderr', data: 'warming cache\n' }))
        .toBe('[stderr] warming cache');
      expect(OutputFormatter.formatDiagnostic({ type: 'stdout-error', error: new Error('read ECONNRESET') }))
        .toBe('[stdio] stdout error: read ECONNRESET');
      expect(OutputFormatter.formatDiagnostic({ type: 'exit', code: null, signal: 'SIGTERM' }))
        .toBe('[stdio] server exited: code=null, signal=SIGTERM');
    });
  });

  describe('printResponse', () => {
    it('should print JSON in json mode', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

      OutputFormatter.printResponse({ success: true, data: { kind: 'ping', ok: true } }, true);

      expect(log).toHaveBeenCalledWith('{"success":true,"data":{"kind":"ping","ok":true}}');
    });

    it('should print failures on stderr', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

      OutputFormatter.printResponse({ success: false, error: 'Server not found: mail' });

      expect(error).toHaveBeenCalledWith('✗', 'Server not found: mail');
    });
  });
});
