// backend/services/web/src/render/BufferPool.ts
/**
 * Reusable growable byte buffers for rendering.
 *
 * A handler borrows a buffer through `withBuffer`, which resets and returns
 * it on every exit path. Buffers that grew past `maxRetainedBytes` are dropped
 * instead of pooled so one huge page does not pin memory.
 */

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => ESCAPES[c] ?? c);
}

export class GrowableBuffer {
  private buf: Buffer;
  private len = 0;

  constructor(initialCapacity = 4096) {
    this.buf = Buffer.allocUnsafe(Math.max(16, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  get capacity(): number {
    return this.buf.length;
  }

  /** Append raw markup or bytes, unescaped. */
  write(chunk: string | Uint8Array): this {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.ensure(bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
    return this;
  }

  /** Append text, HTML-escaped. */
  text(s: string): this {
    return this.write(escapeHtml(s));
  }

  /** Copy of the written bytes; safe to keep after the buffer is released. */
  bytes(): Buffer {
    return Buffer.from(this.buf.subarray(0, this.len));
  }

  toString(): string {
    return this.buf.toString("utf8", 0, this.len);
  }

  reset(): void {
    this.len = 0;
  }

  private ensure(extra: number): void {
    const need = this.len + extra;
    if (need <= this.buf.length) return;
    let cap = this.buf.length * 2;
    while (cap < need) cap *= 2;
    const next = Buffer.allocUnsafe(cap);
    this.buf.copy(next, 0, 0, this.len);
    this.buf = next;
  }
}

export type BufferPoolOptions = {
  initialCapacity?: number;
  maxPooled?: number;
  maxRetainedBytes?: number;
};

export class BufferPool {
  private readonly free: GrowableBuffer[] = [];
  private readonly initialCapacity: number;
  private readonly maxPooled: number;
  private readonly maxRetainedBytes: number;

  constructor(opts: BufferPoolOptions = {}) {
    this.initialCapacity = opts.initialCapacity ?? 4096;
    this.maxPooled = opts.maxPooled ?? 64;
    this.maxRetainedBytes = opts.maxRetainedBytes ?? 1024 * 1024;
  }

  /** Buffers currently idle in the pool. */
  get available(): number {
    return this.free.length;
  }

  acquire(): GrowableBuffer {
    return this.free.pop() ?? new GrowableBuffer(this.initialCapacity);
  }

  release(buf: GrowableBuffer): void {
    buf.reset();
    if (buf.capacity > this.maxRetainedBytes) return;
    if (this.free.length >= this.maxPooled) return;
    if (this.free.includes(buf)) return;
    this.free.push(buf);
  }

  withBuffer<T>(fn: (buf: GrowableBuffer) => T): T {
    const buf = this.acquire();
    try {
      return fn(buf);
    } finally {
      this.release(buf);
    }
  }
}
