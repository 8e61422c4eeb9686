/**
 * Sequencer: hands transactions to a driver strictly one at a time, in
 * the order they were enqueued.
 */

import type { Logger } from "pino";
import { Channel } from "./channel.js";
import { SequencerError } from "./errors.js";
import { describeTransaction, type Transaction } from "./transaction.js";

export class Sequencer {
  private readonly _queue = new Channel<Transaction>();
  private readonly _logger: Logger | undefined;
  private _inFlight: Transaction | undefined;
  private _idleWaiters: Array<() => void> = [];
  private _enqueued = 0;
  private _delivered = 0;

  constructor(logger?: Logger) {
    this._logger = logger;
  }

  /** The transaction handed out by `next()` and not yet completed. */
  get inFlight(): Transaction | undefined {
    return this._inFlight;
  }

  /** Number of transactions completed so far. */
  get completed(): number {
    return this._delivered;
  }

  /** Every enqueued transaction has been completed. */
  private get idle(): boolean {
    return this._delivered === this._enqueued;
  }

  enqueue(...items: Transaction[]): void {
    for (const item of items) {
      this._queue.put(item);
      this._enqueued++;
    }
  }

  /** No more transactions will be enqueued; `next()` ends the stream once drained. */
  finish(): void {
    this._queue.close();
  }

  /**
   * Wait for the next transaction.
   *
   * @returns `undefined` once `finish()` was called and the queue is empty.
   * @throws SequencerError if the previous transaction was not completed.
   */
  async next(): Promise<Transaction | undefined> {
    if (this._inFlight) {
      throw new SequencerError(
        `next() called while ${describeTransaction(this._inFlight)} is still in flight`,
      );
    }
    const result = await this._queue.get();
    if (result.done) return undefined;
    this._inFlight = result.value;
    return result.value;
  }

  /** Mark the in-flight transaction done, unblocking the next one. */
  complete(tx: Transaction): void {
    if (this._inFlight !== tx) {
      throw new SequencerError(
        `complete() called with ${describeTransaction(tx)}, which is not in flight`,
      );
    }
    this._inFlight = undefined;
    this._delivered++;
    this._logger?.debug({ tx: describeTransaction(tx), completed: this._delivered }, "transaction complete");
    if (this.idle) {
      for (const resolve of this._idleWaiters.splice(0)) {
        resolve();
      }
    }
  }

  /** Resolves once every enqueued transaction has been completed. */
  drained(): Promise<void> {
    if (this.idle) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this._idleWaiters.push(resolve);
    });
  }
}
