import { Writable } from 'node:stream';
import winston from 'winston';

/**
 * A winston transport that keeps every emitted line in memory.
 * Writes are asynchronous; await with vi.waitFor before asserting.
 */
export function captureTransport() {
  const lines: string[] = [];

  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString().trimEnd());
      callback();
    },
  });

  return { transport: new winston.transports.Stream({ stream }), lines };
}
