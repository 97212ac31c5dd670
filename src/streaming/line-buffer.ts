/**
 * Reassembles newline-delimited lines from transport byte fragments.
 * A fragment may end mid-line or mid-character; both are carried over to the
 * next push().
 */

export interface LineBuffer {
  /** Feed one fragment; returns every line it completed, delimiters stripped. */
  push(bytes: Uint8Array): string[];
  /**
   * End of stream. Returns [] always: an unterminated trailing line is
   * discarded, since a well-formed SSE stream ends on a full line.
   */
  flush(): string[];
  /** Length of the pending partial line, in UTF-16 code units. */
  readonly pending: number;
}

/**
 * Create a stateful line buffer.
 * Decoding replaces invalid UTF-8 with U+FFFD instead of throwing.
 */
export function createLineBuffer(): LineBuffer {
  const decoder = new TextDecoder('utf-8', { fatal: false });
  let buffer = '';

  return {
    push(bytes: Uint8Array): string[] {
      buffer += decoder.decode(bytes, { stream: true });

      const lastNewline = buffer.lastIndexOf('\n');
      if (lastNewline === -1) return [];

      const complete = buffer.slice(0, lastNewline);
      buffer = buffer.slice(lastNewline + 1);

      return complete
        .split('\n')
        .map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
    },

    flush(): string[] {
      // Drain the decoder so a dangling partial character does not leak into reuse
      decoder.decode();
      buffer = '';
      return [];
    },

    get pending(): number {
      return buffer.length;
    },
  };
}
