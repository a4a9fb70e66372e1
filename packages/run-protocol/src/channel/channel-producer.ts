// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/channel/channel-producer`
 * Purpose: Run a background producer task that feeds a bounded channel, exposed as an async iterable.
 * Scope: Producer/consumer bridging for multi-source emitters. Does not validate items.
 * Invariants:
 *   - The channel closes when the producer settles; a producer error reaches the
 *     consumer after every buffered item
 *   - Stopping iteration early aborts the producer's signal and rejects its pending sends
 * Side-effects: none (spawns one promise chain per iteration)
 * Links: src/channel/bounded-channel.ts
 * @public
 */

import { BoundedChannel } from "./bounded-channel";

export type Emit<T> = (item: T) => Promise<void>;

export interface ChannelProducerOptions {
  /** Buffered items before emit() waits. Default 16. */
  readonly capacity?: number;
  /** External cancellation; aborting it stops the producer too. */
  readonly signal?: AbortSignal;
}

/**
 * Usage:
 * ```typescript
 * const events = channelProducer<ProtocolEvent>(async (emit, signal) => {
 *   await Promise.all([pumpModel(emit, signal), pumpTools(emit, signal)]);
 * });
 * for await (const event of events) ...
 * ```
 */
export function channelProducer<T>(
  produce: (emit: Emit<T>, signal: AbortSignal) => Promise<void>,
  options: ChannelProducerOptions = {}
): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator](): AsyncIterator<T> {
      const channel = new BoundedChannel<T>(options.capacity);
      const controller = new AbortController();
      const onAbort = (): void => controller.abort(options.signal?.reason);
      if (options.signal?.aborted) onAbort();
      options.signal?.addEventListener("abort", onAbort, { once: true });

      const emit: Emit<T> = (item) => channel.send(item);

      // Fire-and-forget: every outcome lands in the channel.
      void produce(emit, controller.signal).then(
        () => channel.close(),
        (error: unknown) => channel.close(error)
      ).finally(() => options.signal?.removeEventListener("abort", onAbort));

      return {
        next: () => channel.next(),
        return: () => {
          controller.abort();
          return channel.return();
        },
      };
    },
  };
}
