/** Copies a Buffer into a standalone ArrayBuffer, as vendor SDKs expect. */
export function toArrayBuffer(chunk: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(chunk.byteLength);
  new Uint8Array(copy).set(chunk);
  return copy;
}
