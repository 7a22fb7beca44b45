import { describe, it, expect } from 'vitest';
import { LineBuffer, decodeLine, encodeLine } from '../../../src/transports/line-buffer.js';

describe('LineBuffer', () => {
  it('should return complete lines and keep the trailing fragment', () => {
    const buffer = new LineBuffer();

    expect(buffer.push('one\ntwo\nthr')).toEqual(['one', 'two']);
    expect(buffer.pending()).toBe('thr');
    expect(buffer.push('ee\n')).toEqual(['three']);
    expect(buffer.pending()).toBe('');
  });

  it('should yield the same lines however the text is chunked', () => {
    const text = '{"id":1}\r\n\n{"id":2}\n{"id":3}\n';

    const whole = new LineBuffer().push(text);

    const split = new LineBuffer();
    const pieces: string[] = [];
    for (const char of text) {
      pieces.push(...split.push(char));
    }

    expect(whole).toEqual(['{"id":1}', '{"id":2}', '{"id":3}']);
    expect(pieces).toEqual(whole);
  });

  it('should strip only one trailing carriage return', () => {
    expect(new LineBuffer().push('a\r\r\n')).toEqual(['a\r']);
  });

  it('should drop buffered text on clear', () => {
    const buffer = new LineBuffer();
    buffer.push('partial');
    buffer.clear();

    expect(buffer.push('\n')).toEqual([]);
  });
});

describe('decodeLine', () => {
  it('should return JSON objects', () => {
    expect(decodeLine('{"jsonrpc":"2.0","id":7}')).toEqual({ jsonrpc: '2.0', id: 7 });
  });

  it('should return undefined for non-objects and invalid JSON', () => {
    expect(decodeLine('not json')).toBeUndefined();
    expect(decodeLine('[]')).toBeUndefined();
    expect(decodeLine('null')).toBeUndefined();
    expect(decodeLine('42')).toBeUndefined();
    expect(decodeLine('{"unterminated":')).toBeUndefined();
  });
});

describe('encodeLine', () => {
  it('should end each message with a single newline', () => {
    expect(encodeLine({ jsonrpc: '2.0', method: 'ping' })).toBe('{"jsonrpc":"2.0","method":"ping"}\n');
  });
});
