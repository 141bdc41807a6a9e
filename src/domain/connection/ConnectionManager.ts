import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { delay } from "../concurrency/delay";
import { createAbortError, describeError, isAbortError } from "../speech/errors";

const DEFAULT_SUPERVISOR_INTERVAL_MS = 1000;

export interface ConnectionFactory<H> {
  readonly name: string;
  open(): Promise<H>;
  isAlive(handle: H): boolean;
  close(handle: H): Promise<void>;
}

export interface ConnectionManagerOptions {
  supervisorIntervalMs?: number;
  /** Supervisor skips reconnecting while this returns false. */
  shouldMaintain?: () => boolean;
}

/**
 * Owns the single connection handle. The handle is only ever replaced by
 * assignment, so readers see either the old or the new connection.
 */
export class ConnectionManager<H> {
  private handle: H | null = null;
  private pending: Promise<H | null> | null = null;
  private supervisorController: AbortController | null = null;
  private supervisorTask: Promise<void> | null = null;
  private closed = false;
  private connects = 0;
  private readonly intervalMs: number;

  constructor(
    private readonly factory: ConnectionFactory<H>,
    private readonly logger: LoggerPort,
    private readonly options: ConnectionManagerOptions = {}
  ) {
    this.intervalMs = Math.max(1, options.supervisorIntervalMs ?? DEFAULT_SUPERVISOR_INTERVAL_MS);
  }

  get connectCount(): number {
    return this.connects;
  }

  get supervising(): boolean {
    return this.supervisorTask !== null;
  }

  current(): H | null {
    const handle = this.handle;
    return handle !== null && this.factory.isAlive(handle) ? handle : null;
  }

  isAlive(handle: H | null = this.handle): boolean {
    return handle !== null && this.factory.isAlive(handle);
  }

  async connect(): Promise<H | null> {
    try {
      const handle = await this.factory.open();
      this.connects += 1;
      this.logger.info(`Connected to ${this.factory.name}`, { attempt: this.connects });
      return handle;
    } catch (err) {
      this.logger.warn(`Failed to connect to ${this.factory.name}`, { error: describeError(err) });
      return null;
    }
  }

  ensureConnected(): Promise<H | null> {
    const live = this.current();
    if (live !== null) return Promise.resolve(live);
    if (this.closed) return Promise.resolve(null);
    if (!this.pending) {
      this.pending = this.reconnect().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  startSupervisor(): void {
    if (this.supervisorTask || this.closed) return;
    const controller = new AbortController();
    this.supervisorController = controller;
    this.supervisorTask = this.supervise(controller.signal);
  }

  async waitForLive(signal: AbortSignal, pollMs: number): Promise<H> {
    for (;;) {
      const live = this.current();
      if (live !== null) return live;
      if (this.closed) throw createAbortError(`${this.factory.name} connection manager is closed`);
      this.logger.debug(`Waiting for ${this.factory.name} connection to be established...`);
      await delay(pollMs, signal);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    this.supervisorController?.abort();
    this.supervisorController = null;
    const supervisor = this.supervisorTask;
    this.supervisorTask = null;
    await supervisor;
    if (this.pending) await this.pending;

    const handle = this.handle;
    this.handle = null;
    if (handle !== null) await this.release(handle);
  }

  private async reconnect(): Promise<H | null> {
    const stale = this.handle;
    if (stale !== null) {
      this.logger.info(`Re-establishing ${this.factory.name} connection...`);
    }

    const next = await this.connect();
    if (next === null) return null;
    if (this.closed) {
      await this.release(next);
      return null;
    }

    this.handle = next;
    if (stale !== null) await this.release(stale);
    return next;
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    const shouldMaintain = this.options.shouldMaintain ?? (() => true);
    while (!signal.aborted) {
      if (shouldMaintain() && this.current() === null) {
        await this.ensureConnected();
      }
      try {
        await delay(this.intervalMs, signal);
      } catch (err) {
        if (isAbortError(err)) return;
        throw err;
      }
    }
  }

  private async release(handle: H): Promise<void> {
    try {
      await this.factory.close(handle);
    } catch (err) {
      this.logger.warn(`Failed to close ${this.factory.name} connection`, { error: describeError(err) });
    }
  }
}
