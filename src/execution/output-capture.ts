/**
 * Bounded output capture.
 *
 * Collects stdout and stderr chunks under one combined byte ceiling. Once the
 * ceiling is reached further data is counted and dropped, never buffered, so
 * the pipes keep draining and the child cannot stall on a full pipe.
 */

export type StreamName = 'stdout' | 'stderr';

export interface OutputCapture {
  /** Append a chunk read from one of the child's pipes. */
  append(stream: StreamName, chunk: Buffer): void;
  /** Decoded text captured for a stream. */
  text(stream: StreamName): string;
  /** True iff at least one byte was dropped. */
  readonly truncated: boolean;
  readonly capturedBytes: number;
  readonly discardedBytes: number;
}

/**
 * Create a capture buffer with a combined ceiling of `maxBytes`.
 */
export function createOutputCapture(maxBytes: number): OutputCapture {
  const chunks: Record<StreamName, Buffer[]> = { stdout: [], stderr: [] };
  const clampedStreams = new Set<StreamName>();
  let captured = 0;
  let discarded = 0;

  return {
    append(stream: StreamName, chunk: Buffer): void {
      const remaining = Math.max(maxBytes - captured, 0);

      if (chunk.length <= remaining) {
        chunks[stream].push(chunk);
        captured += chunk.length;
        return;
      }

      clampedStreams.add(stream);
      discarded += chunk.length - remaining;
      if (remaining > 0) {
        chunks[stream].push(chunk.subarray(0, remaining));
        captured += remaining;
      }
    },

    text(stream: StreamName): string {
      const joined = Buffer.concat(chunks[stream]);
      const safe = clampedStreams.has(stream) ? trimPartialUtf8(joined) : joined;
      return safe.toString('utf8');
    },

    get truncated(): boolean {
      return discarded > 0;
    },

    get capturedBytes(): number {
      return captured;
    },

    get discardedBytes(): number {
      return discarded;
    },
  };
}

/**
 * Drop a multi-byte UTF-8 sequence cut off at the end of the buffer.
 * Decoding it would produce U+FFFD, which is wider than the bytes it replaces.
 */
export function trimPartialUtf8(buffer: Buffer): Buffer {
  let index = buffer.length - 1;
  let continuationBytes = 0;

  while (index >= 0 && continuationBytes < 3 && (buffer[index] & 0xc0) === 0x80) {
    index--;
    continuationBytes++;
  }

  if (index < 0) {
    return buffer;
  }

  const lead = buffer[index];
  const expectedLength = lead >= 0xf0 ? 4 : lead >= 0xe0 ? 3 : lead >= 0xc0 ? 2 : 1;

  if (expectedLength > 1 && continuationBytes + 1 < expectedLength) {
    return buffer.subarray(0, index);
  }
  return buffer;
}
