// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/channel/bounded-channel`
 * Purpose: Bounded async channel between one producer task and one consumer.
 * Scope: In-process hand-off with backpressure. Does not spawn tasks.
 * Invariants:
 *   - send() resolves once the item is buffered or handed to a waiting consumer
 *   - At most `capacity` items are buffered; further senders wait
 *   - close() is the end signal: the consumer drains buffered items, then stops
 *   - close(error) surfaces `error` to the consumer after the buffered items
 *   - send() after close rejects with ChannelClosedError
 * Side-effects: none
 * Links: src/channel/channel-producer.ts
 * @public
 */

import { ChannelClosedError } from "../errors";

interface PendingSend<T> {
  item: T;
  resolve: () => void;
  reject: (error: unknown) => void;
}

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (error: unknown) => void;
}

/**
 * Usage:
 * ```typescript
 * const channel = new BoundedChannel<Event>(16);
 *
 * // Producer
 * await channel.send(event);
 * channel.close();
 *
 * // Consumer
 * for await (const event of channel) handle(event);
 * ```
 */
export class BoundedChannel<T> implements AsyncIterableIterator<T> {
  // Boxed so that `undefined` stays a legal item.
  private readonly buffer: Array<{ readonly item: T }> = [];
  private readonly senders: PendingSend<T>[] = [];
  private receiver: PendingReceive<T> | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;

  constructor(readonly capacity = 16) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items currently buffered. */
  get size(): number {
    return this.buffer.length;
  }

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (this.receiver) {
      const { resolve } = this.receiver;
      this.receiver = null;
      resolve({ value: item, done: false });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ item });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  /**
   * Signal end of stream. Idempotent; the first call wins.
   * Senders still waiting for room are rejected.
   */
  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };

    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }

    if (this.receiver && this.buffer.length === 0) {
      const receiver = this.receiver;
      this.receiver = null;
      this.settleDrained(receiver);
    }
  }

  next(): Promise<IteratorResult<T>> {
    const slot = this.buffer.shift();
    if (slot) {
      this.admitWaitingSender();
      return Promise.resolve({ value: slot.item, done: false });
    }

    if (this.closed) {
      return new Promise((resolve, reject) => this.settleDrained({ resolve, reject }));
    }

    return new Promise((resolve, reject) => {
      this.receiver = { resolve, reject };
    });
  }

  /** Consumer stopped early: close and discard anything buffered. */
  return(): Promise<IteratorResult<T>> {
    this.close();
    this.buffer.length = 0;
    this.failure = null;
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push({ item: sender.item });
    sender.resolve();
  }

  private settleDrained(receiver: PendingReceive<T>): void {
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      receiver.reject(error);
      return;
    }
    receiver.resolve({ value: undefined, done: true });
  }
}
