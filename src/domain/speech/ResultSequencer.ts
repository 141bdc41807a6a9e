import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { CorrelationQueue } from "./CorrelationQueue";
import type { AudioFormat, ResultUnit, UnitMetadata } from "./metadata";
import { reviseMetadata } from "./metadata";

export type UnitState = "awaiting_first_chunk" | "streaming" | "completed";

export interface InboundEvent<R> {
  payload: R;
  /** True for the end-of-unit sentinel. */
  endOfUnit: boolean;
}

export interface RenderedPayload<T> {
  data: T;
  format?: AudioFormat;
}

export type PayloadRenderer<R, T> = (payload: R, meta: UnitMetadata) => RenderedPayload<T>;

/**
 * Attaches pending-unit metadata to inbound events in arrival order.
 *
 * Data events take the next queued record whenever one is waiting and
 * otherwise stay on the active unit. The end-of-unit sentinel closes the
 * active unit while it is still open, so a trailing sentinel never consumes
 * the record of the unit submitted after it.
 */
export class ResultSequencer<T> {
  private active: UnitMetadata | null = null;
  private state: UnitState = "completed";
  private emittedForActive = false;
  private anomalies = 0;

  constructor(
    private readonly queue: CorrelationQueue<UnitMetadata>,
    private readonly logger: LoggerPort
  ) {}

  get unitState(): UnitState {
    return this.state;
  }

  get anomalyCount(): number {
    return this.anomalies;
  }

  /** No unit is open: every submitted unit has either completed or not started. */
  get idle(): boolean {
    return this.active === null || this.state === "completed";
  }

  accept<R>(event: InboundEvent<R>, render: PayloadRenderer<R, T>): ResultUnit<T> | null {
    const meta = this.resolve(event.endOfUnit);
    if (meta === null) {
      this.anomalies += 1;
      this.logger.warn("Dropping inbound event: no unit has been submitted yet");
      return null;
    }

    const rendered = render(event.payload, meta);
    const emitted = reviseMetadata(meta, {
      format: rendered.format ?? meta.format,
      isFirstChunk: !this.emittedForActive,
      endOfStream: event.endOfUnit,
    });
    this.active = emitted;
    this.emittedForActive = true;
    this.state = event.endOfUnit ? "completed" : "streaming";

    if (event.endOfUnit) {
      this.logger.debug("Unit completed", { requestId: emitted.requestId });
    }
    return { data: rendered.data, meta: emitted };
  }

  private resolve(endOfUnit: boolean): UnitMetadata | null {
    const open = this.active !== null && this.state !== "completed";
    if (endOfUnit && open) return this.active;

    const next = this.queue.dequeue();
    if (next !== undefined) {
      this.active = next;
      this.state = "awaiting_first_chunk";
      this.emittedForActive = false;
      return next;
    }

    if (this.active === null) return null;
    if (!open) {
      this.anomalies += 1;
      this.logger.warn("Correlation queue is empty; reusing metadata of the completed unit", {
        requestId: this.active.requestId,
      });
    }
    return this.active;
  }
}
