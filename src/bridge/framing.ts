import { isRecord } from '../validation.js';

import { BridgeError } from './errors.js';
import type { BridgeErrorKind } from './errors.js';

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

function isJsonWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x0a || byte === 0x0d || byte === 0x09;
}

type Shape = 'pending' | 'object' | 'other';

/**
 * Collects the bytes of one unframed JSON message. The wire carries no
 * length prefix: a message ends when the peer half-closes, or earlier once
 * the bytes received so far parse as a complete JSON object.
 *
 * Each appended chunk is scanned once for string and nesting state, so the
 * buffer is only joined and parsed when the top-level object has closed.
 * Multi-byte UTF-8 sequences never contain ASCII bytes, so scanning bytes
 * is safe across chunk boundaries.
 */
export class MessageBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  private shape: Shape = 'pending';
  private depth = 0;
  private inString = false;
  private escaped = false;
  private closed = false;
  private trailing = false;
  private attempted = false;
  private complete: Record<string, unknown> | undefined;

  constructor(
    private readonly maxBytes: number,
    private readonly overflowKind: BridgeErrorKind,
  ) {}

  get byteLength(): number {
    return this.size;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  append(chunk: Buffer): void {
    const next = this.size + chunk.length;
    if (next > this.maxBytes) {
      throw new BridgeError(
        this.overflowKind,
        `Message exceeds ${this.maxBytes} bytes`,
        { maxBytes: this.maxBytes },
      );
    }
    this.chunks.push(chunk);
    this.size = next;
    this.scan(chunk);
  }

  text(): string {
    return Buffer.concat(this.chunks, this.size).toString('utf8');
  }

  /**
   * Returns the parsed object when the buffer already holds a whole JSON
   * object, otherwise undefined. A prefix of an object never parses, so this
   * cannot complete a message early. The buffer is parsed at most once.
   */
  tryComplete(): Record<string, unknown> | undefined {
    if (this.complete) return this.complete;
    if (!this.closed || this.trailing || this.attempted) return undefined;
    this.attempted = true;

    let parsed: unknown;
    try {
      parsed = JSON.parse(this.text());
    } catch {
      return undefined;
    }
    this.complete = isRecord(parsed) ? parsed : undefined;
    return this.complete;
  }

  private scan(chunk: Buffer): void {
    for (let i = 0; i < chunk.length; i += 1) {
      if (this.shape === 'other' || this.trailing) return;
      const byte = chunk[i];

      if (this.closed) {
        if (!isJsonWhitespace(byte)) this.trailing = true;
        continue;
      }
      if (this.shape === 'pending') {
        if (isJsonWhitespace(byte)) continue;
        this.shape = byte === OPEN_BRACE ? 'object' : 'other';
        this.depth = 1;
        continue;
      }
      if (this.inString) {
        if (this.escaped) this.escaped = false;
        else if (byte === BACKSLASH) this.escaped = true;
        else if (byte === QUOTE) this.inString = false;
        continue;
      }

      if (byte === QUOTE) {
        this.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        this.depth += 1;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        this.depth -= 1;
        if (this.depth === 0) this.closed = true;
      }
    }
  }
}
