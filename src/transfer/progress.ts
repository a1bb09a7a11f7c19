/**
 * Progress events and the mailbox workers report into
 */

import { NoopLogger, type Logger } from '../observability/index.js';

export type ProgressEventKind =
  | 'ChunkStarted'
  | 'ChunkProgress'
  | 'ChunkCompleted'
  | 'ChunkFailed'
  | 'ChunkRetrying'
  | 'TransferCompleted'
  | 'TransferFailed';

export interface ProgressEvent {
  readonly kind: ProgressEventKind;
  readonly chunkIndex?: number;
  /** Bytes moved so far for the chunk, or 0 for transfer-level events */
  readonly chunkBytes: number;
  /** Cumulative bytes for the whole transfer */
  readonly bytesTransferred: number;
  readonly totalBytes: number;
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly message?: string;
}

/**
 * Receives batches of events drained from a collector
 */
export type ProgressSink = (events: ProgressEvent[]) => void;

/**
 * Multi-writer, single-reader event queue.
 *
 * Workers enqueue without blocking; a single reader drains in FIFO order.
 * Events enqueued after complete() are dropped.
 */
export class ProgressCollector {
  private queue: ProgressEvent[] = [];
  private completed = false;

  enqueue(event: ProgressEvent): void {
    if (this.completed) {
      return;
    }
    this.queue.push(event);
  }

  /**
   * Removes and returns every queued event
   */
  drain(): ProgressEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  complete(): void {
    this.completed = true;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  get pending(): number {
    return this.queue.length;
  }
}

/**
 * Drains a collector into a sink on a fixed interval.
 *
 * Without a sink, start() closes the collector so nothing accumulates.
 * Sink exceptions are logged and dropped.
 */
export class ProgressPump {
  private timer?: NodeJS.Timeout;

  constructor(
    private readonly collector: ProgressCollector,
    private readonly sink: ProgressSink | undefined,
    private readonly intervalMs: number,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  start(): void {
    if (!this.sink) {
      this.collector.drain();
      this.collector.complete();
      return;
    }
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.flush(), this.intervalMs);
    this.timer.unref();
  }

  /**
   * Hands every queued event to the sink now
   */
  flush(): void {
    const events = this.collector.drain();
    if (!this.sink || events.length === 0) {
      return;
    }

    try {
      this.sink(events);
    } catch (error) {
      this.logger.warn('Progress sink threw', {
        events: events.length,
        errorMessage: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Stops the timer, delivers the remaining events and closes the collector
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.flush();
    this.collector.complete();
  }
}
