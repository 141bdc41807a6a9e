import type { LoggerPort } from "../ports/sys/LoggerPort";
import { AsyncChannel } from "../domain/concurrency/AsyncChannel";
import { delay } from "../domain/concurrency/delay";
import { SerialSender } from "../domain/concurrency/SerialSender";
import { ConnectionManager, type ConnectionFactory } from "../domain/connection/ConnectionManager";
import { CorrelationQueue } from "../domain/speech/CorrelationQueue";
import { describeError, isAbortError, MalformedFrameError } from "../domain/speech/errors";
import type { ResultUnit, UnitMetadata } from "../domain/speech/metadata";
import {
  ResultSequencer,
  type InboundEvent,
  type RenderedPayload,
} from "../domain/speech/ResultSequencer";

export type AdapterStatus = "idle" | "running" | "stopped";

export interface DuplexAdapterOptions {
  supervisorIntervalMs?: number;
  /** Delay between liveness checks while a send waits for a connection. */
  connectionPollMs?: number;
  /** Delay before the receiver looks again when no connection is up. */
  idleReceiveDelayMs?: number;
  /** Pause after a receive error before the receiver retries. */
  receiveRetryDelayMs?: number;
}

/**
 * Shared lifecycle of the streaming synthesizer and transcriber: one
 * supervised connection, a FIFO of pending units, a serialized sender and a
 * receiver pump feeding a single lazily consumed result sequence.
 *
 * @typeParam H - connection handle
 * @typeParam R - raw inbound payload
 * @typeParam T - payload handed to the caller
 */
export abstract class DuplexSpeechAdapter<H, R, T> {
  protected readonly connections: ConnectionManager<H>;
  protected readonly pendingUnits = new CorrelationQueue<UnitMetadata>();
  protected readonly sender: SerialSender;
  protected readonly sequencer: ResultSequencer<T>;
  protected readonly connectionPollMs: number;
  private readonly inbound = new AsyncChannel<InboundEvent<R>>();
  private readonly idleReceiveDelayMs: number;
  private readonly receiveRetryDelayMs: number;
  private status: AdapterStatus = "idle";
  private receiverController: AbortController | null = null;
  private receiverTask: Promise<void> | null = null;
  private resultsTaken = false;

  protected constructor(
    protected readonly label: string,
    factory: ConnectionFactory<H>,
    protected readonly logger: LoggerPort,
    options: DuplexAdapterOptions = {}
  ) {
    this.connections = new ConnectionManager(factory, logger, {
      supervisorIntervalMs: options.supervisorIntervalMs,
      shouldMaintain: () => this.running && this.shouldMaintain(),
    });
    this.sender = new SerialSender(logger);
    this.sequencer = new ResultSequencer<T>(this.pendingUnits, logger);
    this.connectionPollMs = options.connectionPollMs ?? 250;
    this.idleReceiveDelayMs = options.idleReceiveDelayMs ?? 500;
    this.receiveRetryDelayMs = options.receiveRetryDelayMs ?? 1000;
  }

  protected abstract receive(handle: H, signal: AbortSignal): Promise<InboundEvent<R>[]>;

  protected abstract render(payload: R, meta: UnitMetadata): RenderedPayload<T>;

  /** The supervisor stops reconnecting once this returns false. */
  protected shouldMaintain(): boolean {
    return true;
  }

  /** Called for every emitted result, after metadata has been attached. */
  protected observe(_event: InboundEvent<R>, _unit: ResultUnit<T>): void {}

  get state(): AdapterStatus {
    return this.status;
  }

  get pendingUnitCount(): number {
    return this.pendingUnits.size;
  }

  isConnected(): boolean {
    return this.connections.isAlive();
  }

  async start(): Promise<void> {
    if (this.status === "running") return;
    if (this.status === "stopped") {
      throw new Error(`${this.label} was stopped; create a new instance to start again.`);
    }
    this.status = "running";
    this.logger.info(`Starting ${this.label}...`);

    await this.connections.ensureConnected();
    if (this.status !== "running") return;
    this.connections.startSupervisor();

    const controller = new AbortController();
    this.receiverController = controller;
    this.receiverTask = this.pump(controller.signal);
  }

  async stop(): Promise<void> {
    if (this.status === "stopped") return;
    if (this.status === "idle") {
      // Never started: only drop sends still waiting for a connection.
      await this.sender.cancel();
      this.pendingUnits.clear();
      return;
    }
    this.status = "stopped";
    this.logger.info(`Stopping ${this.label}...`);

    await this.sender.cancel();

    this.receiverController?.abort();
    this.receiverController = null;
    await this.receiverTask;
    this.receiverTask = null;

    const droppedEvents = this.inbound.clear();
    this.inbound.close();
    await this.connections.close();
    const abandonedUnits = this.pendingUnits.clear();
    this.logger.info(`${this.label} stopped`, { droppedEvents, abandonedUnits });
  }

  results(): AsyncIterableIterator<ResultUnit<T>> {
    if (this.resultsTaken) {
      throw new Error(`${this.label} results can only be consumed once per instance.`);
    }
    this.resultsTaken = true;
    return this.produce();
  }

  /** Feeds an event that did not come from the connection, e.g. a cache hit. */
  protected injectLocal(event: InboundEvent<R>): void {
    this.inbound.push(event);
  }

  protected get running(): boolean {
    return this.status === "running";
  }

  private async *produce(): AsyncIterableIterator<ResultUnit<T>> {
    for await (const event of this.inbound) {
      let unit: ResultUnit<T> | null;
      try {
        unit = this.sequencer.accept(event, (payload, meta) => this.render(payload, meta));
      } catch (err) {
        this.logger.error(`${this.label} failed to render inbound event`, { error: describeError(err) });
        continue;
      }
      if (unit === null) continue;
      this.observe(event, unit);
      yield unit;
    }
  }

  private async pump(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const handle = this.connections.current();
      if (handle === null) {
        this.logger.debug(`${this.label} is not connected; skipping receive.`);
        if (!(await this.pause(this.idleReceiveDelayMs, signal))) return;
        continue;
      }

      try {
        const events = await this.receive(handle, signal);
        for (const event of events) this.inbound.push(event);
      } catch (err) {
        if (signal.aborted) return;
        if (err instanceof MalformedFrameError) {
          this.logger.warn(`${this.label} skipped a malformed frame`, {
            error: err.message,
            frame: err.frame.slice(0, 200),
          });
          continue;
        }
        this.logger.error(`${this.label} receive failed`, { error: describeError(err) });
        if (!(await this.pause(this.receiveRetryDelayMs, signal))) return;
      }
    }
  }

  private async pause(ms: number, signal: AbortSignal): Promise<boolean> {
    try {
      await delay(ms, signal);
      return true;
    } catch (err) {
      if (isAbortError(err)) return false;
      throw err;
    }
  }
}
