/**
 * Ledger notification emitter
 *
 * Delivers committed notifications to subscribers. Handlers run after the
 * transaction is committed, so nothing they do can roll it back.
 */

import type { LedgerEvent } from '@mintable/types';
import type { Logger } from '@mintable/observability';
import type { LedgerEventHandler } from './ledger-types.js';

export class LedgerEventEmitter {
  private handlers: LedgerEventHandler[] = [];
  private queue: LedgerEvent[] = [];
  private delivering = false;

  constructor(private logger: Logger) {}

  /**
   * Subscribe to committed notifications
   *
   * @returns Function that removes the handler
   */
  on(handler: LedgerEventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  /**
   * Deliver events in order to every handler
   *
   * Events dispatched by an operation a handler starts are queued behind the
   * ones still being delivered, so every handler sees ascending sequences.
   * A handler that throws or rejects is logged and does not stop the others.
   */
  dispatch(events: readonly LedgerEvent[]): void {
    this.queue.push(...events);
    if (this.delivering) {
      return;
    }

    this.delivering = true;
    try {
      let event = this.queue.shift();
      while (event !== undefined) {
        for (const handler of this.handlers) {
          this.invoke(handler, event);
        }
        event = this.queue.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  /**
   * Drop every subscriber; queued events are no longer delivered
   */
  removeAllHandlers(): void {
    this.handlers = [];
    this.queue = [];
  }

  private invoke(handler: LedgerEventHandler, event: LedgerEvent): void {
    try {
      const pending = handler(event);
      if (pending instanceof Promise) {
        pending.catch((err: unknown) => this.reportFailure(err, event));
      }
    } catch (err) {
      this.reportFailure(err, event);
    }
  }

  private reportFailure(err: unknown, event: LedgerEvent): void {
    this.logger.error(
      { err, eventType: event.type, sequence: event.sequence },
      'Ledger event handler failed'
    );
  }
}
