/**
 * Stream drivers: expose a live sequence of content fragments over a byte
 * source, then the merged result once the sequence is drained.
 *
 * Both variants share StreamInterpreter and the lifecycle below; they differ
 * only in how the next byte fragment is read. CompletionStream awaits it,
 * BlockingCompletionStream pulls it synchronously inside next().
 */

import { StreamStateError, TransportError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { FinalResult } from '../shared/types.js';
import { StreamInterpreter } from './interpreter.js';

/**
 * pending    not iterated yet
 * streaming  iteration in progress
 * completed  drained: [DONE] seen or the source ended
 * failed     the byte source threw
 * cancelled  the consumer stopped early or aborted the caller's signal
 */
export type StreamStatus = 'pending' | 'streaming' | 'completed' | 'failed' | 'cancelled';

/** A finished or finishing completion, streaming or not. */
export interface Completion extends AsyncIterable<string> {
  readonly status: StreamStatus;
  /** The merged result. Only available once the fragments are drained. */
  finalize(): FinalResult;
}

/** Context attached to the stream's log lines. */
export interface StreamLabel {
  provider?: string;
  model?: string;
}

abstract class StreamLifecycle {
  protected readonly interpreter = new StreamInterpreter();
  private _status: StreamStatus = 'pending';
  private startedAt = 0;

  constructor(
    protected readonly label: StreamLabel = {},
    private readonly signal?: AbortSignal,
  ) {}

  get status(): StreamStatus {
    return this._status;
  }

  finalize(): FinalResult {
    if (this._status !== 'completed') {
      throw new StreamStateError(
        `Cannot finalize a ${this._status} stream; drain all fragments first`,
      );
    }
    return this.interpreter.finalize();
  }

  protected begin(): void {
    if (this._status !== 'pending') {
      throw new StreamStateError('A completion stream can only be iterated once');
    }
    this._status = 'streaming';
    this.startedAt = performance.now();
  }

  protected complete(): void {
    this.interpreter.end();
    this._status = 'completed';
    logger.debug(
      {
        ...this.label,
        ...this.interpreter.stats,
        terminated: this.interpreter.terminated,
        latencyMs: Math.round(performance.now() - this.startedAt),
      },
      'Stream completed',
    );
  }

  protected fail(error: unknown): TransportError {
    const transportError = TransportError.from(error);
    // The read failed because the caller gave up, not the provider
    if (this.signal?.aborted) {
      this._status = 'cancelled';
      logger.debug({ ...this.label, ...this.interpreter.stats }, 'Stream aborted by caller');
      return transportError;
    }

    this._status = 'failed';
    logger.warn(
      { ...this.label, reason: transportError.reason, error: transportError.message },
      'Stream failed mid-flight',
    );
    return transportError;
  }

  /** Called from finally: anything still streaming there was abandoned. */
  protected settle(): void {
    if (this._status === 'streaming') {
      this._status = 'cancelled';
      logger.debug({ ...this.label, ...this.interpreter.stats }, 'Stream cancelled by consumer');
    }
  }
}

/**
 * Suspending driver over an async byte source such as a fetch body.
 * `signal` is the one the request was sent with; a read that fails after it
 * aborted ends the stream as cancelled rather than failed.
 */
export class CompletionStream extends StreamLifecycle implements Completion {
  constructor(
    private readonly source: AsyncIterable<Uint8Array>,
    label?: StreamLabel,
    signal?: AbortSignal,
  ) {
    super(label, signal);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    this.begin();
    const iterator = this.source[Symbol.asyncIterator]();
    let exhausted = false;

    try {
      while (!this.interpreter.terminated) {
        let next: IteratorResult<Uint8Array>;
        try {
          next = await iterator.next();
        } catch (error) {
          exhausted = true;
          throw this.fail(error);
        }
        if (next.done) {
          exhausted = true;
          break;
        }
        yield* this.interpreter.feed(next.value);
      }
      this.complete();
    } finally {
      this.settle();
      if (!exhausted) {
        await iterator.return?.();
      }
    }
  }
}

/** Blocking driver over a synchronous, pull-based byte source. */
export class BlockingCompletionStream extends StreamLifecycle implements Iterable<string> {
  constructor(
    private readonly source: Iterable<Uint8Array>,
    label?: StreamLabel,
  ) {
    super(label);
  }

  *[Symbol.iterator](): Generator<string, void, undefined> {
    this.begin();
    const iterator = this.source[Symbol.iterator]();
    let exhausted = false;

    try {
      while (!this.interpreter.terminated) {
        let next: IteratorResult<Uint8Array>;
        try {
          next = iterator.next();
        } catch (error) {
          exhausted = true;
          throw this.fail(error);
        }
        if (next.done) {
          exhausted = true;
          break;
        }
        yield* this.interpreter.feed(next.value);
      }
      this.complete();
    } finally {
      this.settle();
      if (!exhausted) {
        iterator.return?.();
      }
    }
  }

  /** Drain every fragment and return them with the merged result. */
  collect(): { fragments: string[]; result: FinalResult } {
    const fragments = Array.from(this);
    return { fragments, result: this.finalize() };
  }
}

/** Drain a completion, returning every fragment and the merged result. */
export async function collectCompletion(
  completion: Completion,
): Promise<{ fragments: string[]; result: FinalResult }> {
  const fragments: string[] = [];
  for await (const fragment of completion) {
    fragments.push(fragment);
  }
  return { fragments, result: completion.finalize() };
}
