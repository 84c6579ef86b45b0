/**
 * @fileoverview Tests for line framing, deadlines and writes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'stream';
import { WriteError } from '../../errors/index.js';
import { LineChannel } from '../line-channel.js';

describe('LineChannel', () => {
  let input: PassThrough;
  let output: PassThrough;
  let channel: LineChannel;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    output.setEncoding('utf8');
    channel = new LineChannel(input, output);
  });

  describe('readLine', () => {
    it('should frame lines split across chunks', async () => {
      input.write('uci');
      input.write('ok\r\nready');
      input.write('ok\n');

      expect(await channel.readLine()).toEqual({ kind: 'line', line: 'uciok' });
      expect(await channel.readLine()).toEqual({ kind: 'line', line: 'readyok' });
    });

    it('should keep control characters other than line endings', async () => {
      input.write('info string a\tb\u0001\n');

      expect(await channel.readLine()).toEqual({ kind: 'line', line: 'info string a\tb\u0001' });
    });

    it('should deliver an unterminated remainder at end of stream', async () => {
      const first = channel.readLine();
      input.end('bestmove e2e4');

      expect(await first).toEqual({ kind: 'line', line: 'bestmove e2e4' });
      expect(await channel.readLine()).toEqual({ kind: 'closed' });
      expect(channel.isClosed).toBe(true);
    });

    it('should time out immediately for a deadline in the past', async () => {
      expect(await channel.readLine(Date.now() - 1)).toEqual({ kind: 'timeout' });
    });

    it('should hand the next line to the next reader after a timeout', async () => {
      expect(await channel.readLine(Date.now() + 20)).toEqual({ kind: 'timeout' });

      input.write('readyok\n');

      expect(await channel.readLine(Date.now() + 1000)).toEqual({ kind: 'line', line: 'readyok' });
    });

    it('should buffer lines until they are read', async () => {
      input.write('a\nb\n');
      await new Promise((resolve) => setImmediate(resolve));

      expect(channel.buffered).toBe(2);
      expect(await channel.readLine()).toEqual({ kind: 'line', line: 'a' });
      expect(channel.buffered).toBe(1);
    });
  });

  describe('close', () => {
    it('should resolve pending reads with closed', async () => {
      const pending = channel.readLine(Date.now() + 5000);

      channel.close();

      expect(await pending).toEqual({ kind: 'closed' });
    });
  });

  describe('writeLine', () => {
    it('should write the text with a trailing newline', async () => {
      await channel.writeLine('isready');

      expect(output.read()).toBe('isready\n');
    });

    it('should fail once the channel is closed', async () => {
      channel.close();

      await expect(channel.writeLine('uci')).rejects.toThrow(WriteError);
    });

    it('should fail when the output stream is destroyed', async () => {
      output.destroy();

      await expect(channel.writeLine('uci')).rejects.toThrow('Failed to write "uci": engine input stream is closed');
    });
  });
});
