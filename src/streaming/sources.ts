/**
 * Byte sources for the stream drivers.
 * Each source releases what it holds when its iterator is closed early.
 */

import { closeSync, openSync, readSync } from 'node:fs';

const DEFAULT_READ_SIZE = 16 * 1024;

/**
 * Async bytes from a fetch response body. Stopping early cancels the body,
 * which tears down the underlying connection.
 */
export async function* readableBytes(
  body: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let settled = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        settled = true;
        return;
      }
      yield value;
    }
  } catch (error) {
    settled = true;
    throw error;
  } finally {
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Blocking, pull-based bytes from a file (or any path readSync accepts).
 * Each next() performs one synchronous read.
 */
export function* fileBytes(
  path: string,
  readSize: number = DEFAULT_READ_SIZE,
): Generator<Uint8Array, void, undefined> {
  const fd = openSync(path, 'r');
  try {
    const buffer = new Uint8Array(readSize);
    while (true) {
      const bytesRead = readSync(fd, buffer, 0, readSize, null);
      if (bytesRead === 0) return;
      // Copy out: the read buffer is reused on the next pull
      yield buffer.slice(0, bytesRead);
    }
  } finally {
    closeSync(fd);
  }
}

/** Split bytes into fixed-size fragments, as a transport might deliver them. */
export function* chunkBytes(
  bytes: Uint8Array,
  size: number,
): Generator<Uint8Array, void, undefined> {
  if (size < 1) {
    throw new RangeError(`Chunk size must be at least 1, got ${size}`);
  }
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}

/** Async counterpart of an in-memory fragment list. */
export async function* asyncBytes(
  fragments: Iterable<Uint8Array>,
): AsyncGenerator<Uint8Array, void, undefined> {
  for (const fragment of fragments) {
    yield fragment;
  }
}
