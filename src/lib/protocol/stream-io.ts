/**
 * Promise based exact reads and writes over byte streams.
 *
 * Reads take exactly the requested number of bytes off the stream, so
 * whatever follows a message stays buffered for the next reader.
 */

import type { Readable, Writable } from 'stream';
import { HolePunchError, toError } from '../errors';

export interface ReadOptions {
  /** Fail with TRANSPORT_FAILED if no data completes the read in time */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export function readExactly(stream: Readable, size: number, options: ReadOptions = {}): Promise<Buffer> {
  if (size === 0) {
    return Promise.resolve(Buffer.alloc(0));
  }

  return new Promise<Buffer>((resolve, reject) => {
    if (stream.destroyed || stream.readableEnded) {
      reject(new HolePunchError('TRANSPORT_FAILED', 'Connection closed'));
      return;
    }
    if (options.signal?.aborted) {
      reject(new HolePunchError('ABORTED', 'Read aborted'));
      return;
    }

    let timer: NodeJS.Timeout | undefined;

    const cleanup = (): void => {
      if (timer) clearTimeout(timer);
      stream.off('readable', onReadable);
      stream.off('end', onEnd);
      stream.off('close', onClose);
      stream.off('error', onError);
      options.signal?.removeEventListener('abort', onAbort);
    };

    const fail = (err: Error): void => {
      cleanup();
      reject(err);
    };

    const onReadable = (): void => {
      const chunk: Buffer | null = stream.read(size);
      if (chunk === null) return;
      if (chunk.length < size) {
        fail(new HolePunchError('TRANSPORT_FAILED', 'Connection closed mid-message', {
          expected: size,
          received: chunk.length
        }));
        return;
      }
      cleanup();
      resolve(chunk);
    };

    const onEnd = (): void => fail(new HolePunchError('TRANSPORT_FAILED', 'Connection ended by peer'));
    const onClose = (): void => fail(new HolePunchError('TRANSPORT_FAILED', 'Connection closed'));
    const onError = (err: Error): void =>
      fail(new HolePunchError('TRANSPORT_FAILED', `Read failed: ${err.message}`, undefined, { cause: err }));
    const onAbort = (): void => fail(new HolePunchError('ABORTED', 'Read aborted'));

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        fail(new HolePunchError('TRANSPORT_FAILED', `Read timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    stream.on('readable', onReadable);
    stream.once('end', onEnd);
    stream.once('close', onClose);
    stream.once('error', onError);
    options.signal?.addEventListener('abort', onAbort, { once: true });

    onReadable();
  });
}

export function writeAll(stream: Writable, data: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (stream.destroyed || stream.writableEnded) {
      reject(new HolePunchError('TRANSPORT_FAILED', 'Connection closed'));
      return;
    }
    stream.write(data, (err) => {
      if (err) {
        const error = toError(err);
        reject(new HolePunchError('TRANSPORT_FAILED', `Write failed: ${error.message}`, undefined, {
          cause: error
        }));
      } else {
        resolve();
      }
    });
  });
}
