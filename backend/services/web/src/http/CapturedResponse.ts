// backend/services/web/src/http/CapturedResponse.ts
/**
 * Purpose:
 * - Buffer everything an inner handler chain writes (status, headers, body)
 *   so an outer layer can decide later whether it reaches the client.
 *
 * How:
 * - `attach(res)` returns a response view: an object whose prototype is the
 *   real response. Express helpers (`res.send`, `res.json`, `res.type`, ...)
 *   keep working because they call `this.setHeader` / `this.end`, and the
 *   view overrides exactly those writer methods to record into this buffer.
 *   The real response object is never modified.
 * - Event subscriptions on the view are forwarded to the real response, so
 *   `finish`/`close` listeners behave as usual.
 *
 * Invariants:
 * - `commit(res)` runs at most once; after commit or `discard()` the view
 *   silently drops further writes.
 */

import type { Response } from "express";
import type { OutgoingHttpHeaders, ServerResponse } from "node:http";
import { deferredCallback, toBuffer } from "@fretwire/shared/http/chunks";

type HeaderValue = number | string | string[];

type HeaderEntry = { name: string; value: HeaderValue };

function copyValue(value: number | string | readonly string[]): HeaderValue {
  return typeof value === "object" ? [...value] : value;
}

function createView(res: Response): Response {
  return Object.create(res);
}

export class CapturedResponse {
  private readonly headers = new Map<string, HeaderEntry>();
  private readonly chunks: Buffer[] = [];
  private statusCode = 200;
  private statusMessage: string | undefined;
  private ended = false;
  private sealed = false;
  private readonly endListeners: Array<() => void> = [];

  get isEnded(): boolean {
    return this.ended;
  }

  get status(): number {
    return this.statusCode;
  }

  get body(): Buffer {
    return Buffer.concat(this.chunks);
  }

  /** Called once when the inner chain ends its response. */
  onEnd(listener: () => void): void {
    if (this.ended) listener();
    else this.endListeners.push(listener);
  }

  setHeader(name: string, value: number | string | readonly string[]): void {
    if (this.sealed) return;
    this.headers.set(name.toLowerCase(), { name, value: copyValue(value) });
  }

  appendHeader(name: string, value: string | readonly string[]): void {
    if (this.sealed) return;
    const prev = this.headers.get(name.toLowerCase());
    const add = typeof value === "string" ? [value] : [...value];
    if (!prev) {
      this.setHeader(name, add.length === 1 ? add[0] : add);
      return;
    }
    const before =
      typeof prev.value === "object" ? prev.value : [String(prev.value)];
    this.setHeader(prev.name, [...before, ...add]);
  }

  getHeader(name: string): HeaderValue | undefined {
    return this.headers.get(name.toLowerCase())?.value;
  }

  hasHeader(name: string): boolean {
    return this.headers.has(name.toLowerCase());
  }

  removeHeader(name: string): void {
    if (this.sealed) return;
    this.headers.delete(name.toLowerCase());
  }

  getHeaderNames(): string[] {
    return [...this.headers.keys()];
  }

  getHeaders(): OutgoingHttpHeaders {
    const out: OutgoingHttpHeaders = {};
    for (const [key, { value }] of this.headers) out[key] = value;
    return out;
  }

  writeHead(status: number, message?: string): void {
    if (this.sealed) return;
    this.statusCode = status;
    if (message !== undefined) this.statusMessage = message;
  }

  write(chunk: Buffer | undefined): boolean {
    if (this.ended || this.sealed) return false;
    if (chunk && chunk.length > 0) this.chunks.push(chunk);
    return true;
  }

  end(chunk: Buffer | undefined, status: number): void {
    if (this.ended || this.sealed) return;
    if (chunk && chunk.length > 0) this.chunks.push(chunk);
    this.statusCode = status;
    this.ended = true;
    for (const l of this.endListeners.splice(0)) l();
  }

  /**
   * Copy the captured headers onto the real response, replacing whatever
   * outer layers had set there (the view started from those same headers).
   */
  applyHeaders(res: ServerResponse): void {
    for (const name of res.getHeaderNames()) {
      if (!this.headers.has(name)) res.removeHeader(name);
    }
    for (const { name, value } of this.headers.values()) {
      res.setHeader(name, value);
    }
  }

  /** Write status, headers and body to the real response, once. */
  commit(res: ServerResponse): void {
    if (this.sealed) return;
    this.sealed = true;
    this.applyHeaders(res);
    res.statusCode = this.statusCode;
    if (this.statusMessage !== undefined) res.statusMessage = this.statusMessage;
    res.end(this.body);
  }

  /** Drop everything; later writes through the view go nowhere. */
  discard(): void {
    this.sealed = true;
    this.chunks.length = 0;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Build the response view handed to the inner chain. Headers already set on
   * the real response are visible through it from the start.
   */
  attach(res: Response): Response {
    for (const [key, value] of Object.entries(res.getHeaders())) {
      if (value !== undefined) this.setHeader(key, value);
    }

    const view = createView(res);
    view.statusCode = res.statusCode;

    view.setHeader = (name: string, value: number | string | readonly string[]) => {
      this.setHeader(name, value);
      return view;
    };
    view.appendHeader = (name: string, value: string | readonly string[]) => {
      this.appendHeader(name, value);
      return view;
    };
    view.getHeader = (name: string) => this.getHeader(name);
    view.getHeaders = () => this.getHeaders();
    view.getHeaderNames = () => this.getHeaderNames();
    view.hasHeader = (name: string) => this.hasHeader(name);
    view.removeHeader = (name: string) => {
      this.removeHeader(name);
    };
    view.flushHeaders = () => undefined;

    view.writeHead = (status: number, reasonOrHeaders?: unknown, maybeHeaders?: unknown) => {
      const message = typeof reasonOrHeaders === "string" ? reasonOrHeaders : undefined;
      const headers = message === undefined ? reasonOrHeaders : maybeHeaders;
      view.statusCode = status;
      this.writeHead(status, message);
      if (headers && typeof headers === "object" && !Array.isArray(headers)) {
        for (const [k, v] of Object.entries(headers)) {
          if (typeof v === "string" || typeof v === "number") this.setHeader(k, v);
          else if (Array.isArray(v)) this.setHeader(k, v.map(String));
        }
      }
      return view;
    };

    view.write = (chunk: unknown, encoding?: unknown, callback?: unknown): boolean => {
      const ok = this.write(toBuffer(chunk, encoding));
      deferredCallback(encoding, callback)?.();
      return ok;
    };

    view.end = (chunk?: unknown, encoding?: unknown, callback?: unknown) => {
      this.end(toBuffer(chunk, encoding), view.statusCode);
      deferredCallback(chunk, encoding, callback)?.();
      return view;
    };

    Object.defineProperty(view, "headersSent", {
      configurable: true,
      get: () => this.ended,
    });
    Object.defineProperty(view, "writableEnded", {
      configurable: true,
      get: () => this.ended,
    });

    view.on = (...args: Parameters<Response["on"]>) => {
      res.on(...args);
      return view;
    };
    view.once = (...args: Parameters<Response["once"]>) => {
      res.once(...args);
      return view;
    };
    view.addListener = (...args: Parameters<Response["addListener"]>) => {
      res.addListener(...args);
      return view;
    };
    view.removeListener = (...args: Parameters<Response["removeListener"]>) => {
      res.removeListener(...args);
      return view;
    };
    view.off = (...args: Parameters<Response["off"]>) => {
      res.off(...args);
      return view;
    };
    view.prependListener = (...args: Parameters<Response["prependListener"]>) => {
      res.prependListener(...args);
      return view;
    };

    return view;
  }
}
