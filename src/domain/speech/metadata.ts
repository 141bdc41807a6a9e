import { randomUUID } from "crypto";

export type AudioFormat = "wav" | "pcm" | "mulaw";

export type AudioEncoding = "pcm" | "mulaw";

export interface MetadataInput {
  requestId?: string;
  sequenceId?: number;
  format?: AudioFormat;
  endOfUpstream?: boolean;
  extra?: Record<string, unknown>;
}

/**
 * Caller metadata for one logical unit. Records are never mutated: flag changes
 * go through {@link reviseMetadata}, which hands back a new record with a
 * bumped version.
 */
export interface UnitMetadata {
  readonly requestId: string;
  readonly sequenceId?: number;
  readonly format?: AudioFormat;
  readonly text?: string;
  readonly endOfUpstream: boolean;
  readonly isFirstChunk: boolean;
  readonly endOfStream: boolean;
  readonly submittedAt: number;
  readonly version: number;
  readonly extra: Readonly<Record<string, unknown>>;
}

export type MetadataPatch = Partial<
  Pick<UnitMetadata, "format" | "isFirstChunk" | "endOfStream" | "text">
>;

export interface ResultUnit<T> {
  readonly data: T;
  readonly meta: UnitMetadata;
}

export function createMetadata(
  input: MetadataInput = {},
  fields: { text?: string; submittedAt?: number } = {}
): UnitMetadata {
  const requestId = input.requestId?.trim() || randomUUID();
  return {
    requestId,
    sequenceId: input.sequenceId,
    format: input.format,
    text: fields.text,
    endOfUpstream: input.endOfUpstream === true,
    isFirstChunk: false,
    endOfStream: false,
    submittedAt: fields.submittedAt ?? Date.now(),
    version: 0,
    extra: { ...(input.extra ?? {}) },
  };
}

export function reviseMetadata(meta: UnitMetadata, patch: MetadataPatch): UnitMetadata {
  return { ...meta, ...patch, version: meta.version + 1 };
}
