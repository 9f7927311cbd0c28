// backend/services/shared/src/http/chunks.ts
/**
 * Normalizers for the loosely typed arguments of `res.write` / `res.end`
 * (chunk, encoding and callback may each be omitted or shifted left).
 */

function isEncoding(v: unknown): v is BufferEncoding {
  return typeof v === "string" && Buffer.isEncoding(v);
}

/** Returns undefined when the caller passed no chunk (or only a callback). */
export function toBuffer(chunk: unknown, encoding?: unknown): Buffer | undefined {
  if (chunk === undefined || chunk === null || typeof chunk === "function") {
    return undefined;
  }
  if (Buffer.isBuffer(chunk)) return chunk;
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  if (typeof chunk === "string") {
    return Buffer.from(chunk, isEncoding(encoding) ? encoding : "utf8");
  }
  return Buffer.from(String(chunk));
}

/** First function among the trailing arguments, wrapped so it runs async. */
export function deferredCallback(...args: unknown[]): (() => void) | undefined {
  for (const a of args) {
    if (typeof a === "function") {
      return () => {
        setImmediate(() => a());
      };
    }
  }
  return undefined;
}
