import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { describeError, isAbortError } from "../speech/errors";

export type SendTask = (signal: AbortSignal) => Promise<void>;

/**
 * Runs send tasks one after another so chunks of consecutive units never
 * interleave on the connection. `cancel()` resolves once the running task has
 * observed the abort.
 */
export class SerialSender {
  private tail: Promise<void> = Promise.resolve();
  private controller = new AbortController();
  private queued = 0;

  constructor(private readonly logger: LoggerPort) {}

  get inFlight(): number {
    return this.queued;
  }

  schedule(label: string, task: SendTask): void {
    const signal = this.controller.signal;
    this.queued += 1;
    this.tail = this.tail
      .then(async () => {
        if (signal.aborted) return;
        await task(signal);
      })
      .catch((err: unknown) => {
        if (isAbortError(err)) {
          this.logger.info(`${label} cancelled`);
          return;
        }
        this.logger.error(`${label} failed`, { error: describeError(err) });
      })
      .finally(() => {
        this.queued -= 1;
      });
  }

  async cancel(): Promise<void> {
    this.controller.abort();
    await this.tail;
    this.controller = new AbortController();
  }

  whenIdle(): Promise<void> {
    return this.tail;
  }
}
