/**
 * Line buffer + classifier + aggregator wired together for one stream.
 * Everything here is synchronous; the drivers decide how bytes arrive.
 */

import { logger } from '../shared/logger.js';
import type { FinalResult } from '../shared/types.js';
import { StreamAggregator } from './aggregator.js';
import { classifyLine } from './frame-classifier.js';
import { createLineBuffer } from './line-buffer.js';

/** Counters kept for the completion log line. */
export interface InterpreterStats {
  lines: number;
  fragments: number;
  dropped: number;
  meteringEvents: number;
}

export class StreamInterpreter {
  private readonly lines = createLineBuffer();
  private readonly aggregator = new StreamAggregator();
  private _terminated = false;
  public readonly stats: InterpreterStats = {
    lines: 0,
    fragments: 0,
    dropped: 0,
    meteringEvents: 0,
  };

  /** True once a `data: [DONE]` line has been seen. */
  get terminated(): boolean {
    return this._terminated;
  }

  /**
   * Feed one transport fragment. Returns the content fragments it completed,
   * in line order. Lines after the termination marker are ignored.
   */
  feed(bytes: Uint8Array): string[] {
    const fragments: string[] = [];
    if (this._terminated) return fragments;

    for (const line of this.lines.push(bytes)) {
      this.stats.lines++;
      const frame = classifyLine(line);

      switch (frame.kind) {
        case 'termination':
          this._terminated = true;
          return fragments;
        case 'unparseable':
          if (line.trim() !== '') {
            this.stats.dropped++;
            logger.debug({ line: line.slice(0, 200) }, 'Dropped unparseable SSE line');
          }
          continue;
        case 'comment':
          if (line.trimStart().startsWith(': energy')) {
            logger.debug({ line: line.slice(0, 200) }, 'Ignoring malformed energy comment');
          }
          continue;
        case 'metering':
          this.stats.meteringEvents++;
          break;
        case 'chunk':
          break;
      }

      const text = this.aggregator.observe(frame);
      if (text !== undefined) {
        this.stats.fragments++;
        fragments.push(text);
      }
    }

    return fragments;
  }

  /** Signal end of input; any unterminated trailing line is discarded. */
  end(): void {
    if (this.lines.pending > 0) {
      logger.debug({ pending: this.lines.pending }, 'Discarding unterminated trailing line');
    }
    this.lines.flush();
  }

  finalize(): FinalResult {
    return this.aggregator.finalize();
  }
}
