// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@runwire/run-protocol/engine/run-supervisor`
 * Purpose: Process-scoped registry of active runs with drain-with-timeout shutdown.
 * Scope: Lifetime bookkeeping and cancellation. Does not execute runs itself.
 * Invariants:
 *   - REGISTRATION_BRACKETS_RUN: every register() is paired with exactly one release()
 *   - A runId is active at most once
 *   - After shutdown() starts, register() throws SupervisorClosedError
 *   - shutdown() waits up to timeoutMs for runs to finish, then aborts the rest
 *     and waits up to timeoutMs again; no timer outlives the call
 * Side-effects: timers during shutdown
 * Links: src/engine/run-engine.ts, services/run-gateway/src/main.ts
 * @public
 */

import { RunAlreadyActiveError, SupervisorClosedError } from "../errors";
import { childLogger, type LoggerLike, NOOP_LOGGER } from "../logging";
import type { RunIdentity } from "../requests/run-request";

export interface RunLease {
  /** Aborted on shutdown or supervisor.abort(runId) */
  readonly signal: AbortSignal;
  /** Idempotent */
  release(): void;
}

export interface ShutdownOptions {
  readonly timeoutMs: number;
  /** Abort reason handed to runs still active after the drain window */
  readonly reason?: unknown;
}

export interface ShutdownReport {
  /** Runs that finished on their own during the drain window */
  readonly drained: number;
  /** Runs that had to be aborted */
  readonly aborted: number;
  /** Runs still registered when shutdown gave up */
  readonly remaining: number;
}

interface ActiveRun {
  readonly identity: RunIdentity;
  readonly controller: AbortController;
  readonly startedAt: number;
}

export class RunSupervisor {
  private readonly runs = new Map<string, ActiveRun>();
  private readonly idleWaiters = new Set<() => void>();
  private closing = false;
  private readonly log: LoggerLike;

  constructor(logger: LoggerLike = NOOP_LOGGER) {
    this.log = childLogger(logger, { component: "RunSupervisor" });
  }

  get accepting(): boolean {
    return !this.closing;
  }

  get size(): number {
    return this.runs.size;
  }

  activeRunIds(): string[] {
    return [...this.runs.keys()];
  }

  /**
   * Register a run for its lifetime.
   * @throws SupervisorClosedError while shutting down
   * @throws RunAlreadyActiveError when the runId is already registered
   */
  register(identity: RunIdentity): RunLease {
    if (this.closing) throw new SupervisorClosedError();
    if (this.runs.has(identity.runId)) throw new RunAlreadyActiveError(identity.runId);

    const run: ActiveRun = {
      identity,
      controller: new AbortController(),
      startedAt: Date.now(),
    };
    this.runs.set(identity.runId, run);

    let released = false;
    return {
      signal: run.controller.signal,
      release: () => {
        if (released) return;
        released = true;
        this.deregister(identity.runId, run);
      },
    };
  }

  /** register + run + release, whatever the task's outcome. */
  async track<T>(
    identity: RunIdentity,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const lease = this.register(identity);
    try {
      return await task(lease.signal);
    } finally {
      lease.release();
    }
  }

  /** Abort one run. Returns false when it is not active. */
  abort(runId: string, reason?: unknown): boolean {
    const run = this.runs.get(runId);
    if (!run) return false;
    run.controller.abort(reason);
    return true;
  }

  async shutdown(options: ShutdownOptions): Promise<ShutdownReport> {
    this.closing = true;
    const initial = this.runs.size;
    if (initial === 0) return { drained: 0, aborted: 0, remaining: 0 };

    this.log.info({ active: initial, timeoutMs: options.timeoutMs }, "draining runs");
    await this.waitForIdle(options.timeoutMs);

    const stragglers = [...this.runs.values()];
    const drained = initial - stragglers.length;
    if (stragglers.length === 0) return { drained, aborted: 0, remaining: 0 };

    const reason = options.reason ?? new Error("run supervisor shutting down");
    for (const run of stragglers) {
      this.log.warn(
        { runId: run.identity.runId, ageMs: Date.now() - run.startedAt },
        "aborting run on shutdown"
      );
      run.controller.abort(reason);
    }
    await this.waitForIdle(options.timeoutMs);

    return { drained, aborted: stragglers.length, remaining: this.runs.size };
  }

  private deregister(runId: string, run: ActiveRun): void {
    if (this.runs.get(runId) !== run) return;
    this.runs.delete(runId);
    if (this.runs.size === 0) {
      for (const wake of [...this.idleWaiters]) wake();
    }
  }

  private waitForIdle(timeoutMs: number): Promise<void> {
    if (this.runs.size === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.idleWaiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      this.idleWaiters.add(done);
    });
  }
}
