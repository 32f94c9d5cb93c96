// src/core/text/cursor.ts
// Position-tracked views over a TextBuffer
//
// Two variants share one capability surface:
//   BoundedCursor   - a pure slice; `end` never moves
//   StreamingCursor - backed by a TextSource; `end` grows as chunks are pulled
// Range views are always bounded, so sub-expansion never needs to know which
// kind of cursor it was cut from.

import { TextBuffer } from "./buffer";
import type { TextSource } from "./source";
import { fileSource } from "./source";
import { MacroError } from "../../outcome/errors";
import { cursorMisuse, unboundedRange } from "../../outcome/constructors";

export type CursorKind = "bounded" | "streaming";

type Step = { ch: string; width: number };

const NEWLINE = 10;
const CARRIAGE_RETURN = 13;

abstract class CursorBase implements Iterable<string> {
  abstract readonly kind: CursorKind;

  readonly buffer: TextBuffer;
  readonly file: string;
  /** Lowest offset this view may re-slice with `range()` */
  readonly origin: number;
  pos: number;
  protected limit: number;
  private lastStep: { at: number; width: number } | undefined;

  protected constructor(buffer: TextBuffer, start: number, end: number, file: string) {
    if (start < 0 || start > end || end > buffer.length) {
      throw new MacroError(unboundedRange(start, end, 0, buffer.length));
    }
    this.buffer = buffer;
    this.file = file;
    this.origin = start;
    this.pos = start;
    this.limit = end;
  }

  get end(): number {
    return this.limit;
  }

  /** Try to make more text available past `end`. Bounded views never can. */
  protected fill(): boolean {
    return false;
  }

  private stepAt(at: number): Step | undefined {
    if (at >= this.limit && !this.fill()) return undefined;
    const unit = this.buffer.charCodeAt(at);
    // high surrogate sitting on the edge: its partner may still be unread
    if (unit >= 0xd800 && unit <= 0xdbff && at + 1 >= this.limit) this.fill();
    const cp = this.buffer.codePointAt(at);
    if (cp === undefined) return undefined;
    const ch = String.fromCodePoint(cp);
    if (at + ch.length > this.limit) {
      return { ch: String.fromCharCode(unit), width: 1 };
    }
    return { ch, width: ch.length };
  }

  next(): string | undefined {
    const step = this.stepAt(this.pos);
    if (!step) return undefined;
    this.pos += step.width;
    this.lastStep = { at: this.pos, width: step.width };
    return step.ch;
  }

  peek(): string | undefined {
    return this.stepAt(this.pos)?.ch;
  }

  /**
   * Undo exactly one `next()`. Anything else is a caller bug.
   */
  back(): void {
    const last = this.lastStep;
    if (!last || last.at !== this.pos) {
      throw new MacroError(cursorMisuse(`back() at ${this.pos} without a preceding next()`));
    }
    this.pos -= last.width;
    this.lastStep = undefined;
  }

  atEnd(): boolean {
    return this.stepAt(this.pos) === undefined;
  }

  /**
   * A bounded view over `[start, stop)`. Already-consumed text of this view
   * (back to `origin`) may be re-sliced.
   */
  range(start: number, stop: number): BoundedCursor {
    if (start < this.origin || start > stop || stop > this.limit) {
      throw new MacroError(unboundedRange(start, stop, this.origin, this.limit));
    }
    return new BoundedCursor(this.buffer, start, stop, this.file);
  }

  /** Bounded view of everything not yet consumed. */
  rest(): BoundedCursor {
    this.drain();
    return this.range(this.pos, this.limit);
  }

  readUntilEndOfLine(): string | undefined {
    if (this.atEnd()) return undefined;
    const start = this.pos;
    let at = this.pos;
    for (;;) {
      if (at >= this.limit && !this.fill()) {
        this.advanceTo(at);
        return this.buffer.slice(start, at);
      }
      if (this.buffer.charCodeAt(at) === NEWLINE) {
        let stop = at;
        if (stop > start && this.buffer.charCodeAt(stop - 1) === CARRIAGE_RETURN) stop--;
        this.advanceTo(at + 1);
        return this.buffer.slice(start, stop);
      }
      at++;
    }
  }

  collect(): string {
    this.drain();
    const text = this.buffer.slice(this.pos, this.limit);
    this.advanceTo(this.limit);
    return text;
  }

  collectChars(): string[] {
    return Array.from(this.collect());
  }

  *[Symbol.iterator](): Iterator<string> {
    for (let ch = this.next(); ch !== undefined; ch = this.next()) {
      yield ch;
    }
  }

  protected drain(): void {
    while (this.fill());
  }

  private advanceTo(at: number): void {
    this.pos = at;
    this.lastStep = undefined;
  }
}

/**
 * A pure in-memory slice. Cannot pull more text.
 */
export class BoundedCursor extends CursorBase {
  readonly kind = "bounded" as const;

  constructor(buffer: TextBuffer, start: number, end: number, file: string) {
    super(buffer, start, end, file);
  }

  /** Wrap a string in a fresh single-owner buffer. */
  static fromString(text: string, file = "<string>"): BoundedCursor {
    return new BoundedCursor(TextBuffer.from(text), 0, text.length, file);
  }
}

/**
 * Reads its buffer from a TextSource on demand. Owns its buffer: nothing
 * else appends to it, so `end` always equals the buffer length.
 */
export class StreamingCursor extends CursorBase {
  readonly kind = "streaming" as const;
  private source: TextSource | undefined;

  constructor(source: TextSource, file: string) {
    super(new TextBuffer(), 0, 0, file);
    this.source = source;
  }

  static overFile(filePath: string, chunkSize?: number): StreamingCursor {
    return new StreamingCursor(fileSource(filePath, chunkSize), filePath);
  }

  /** Append the next chunk; false once the source is exhausted. */
  pull(): boolean {
    if (!this.source) return false;
    const chunk = this.source.pull();
    if (chunk === undefined) {
      this.close();
      return false;
    }
    this.buffer.append(chunk);
    this.limit = this.buffer.length;
    return true;
  }

  get exhausted(): boolean {
    return this.source === undefined;
  }

  /**
   * Stop reading and release the source. Text already pulled stays readable.
   */
  close(): void {
    const source = this.source;
    this.source = undefined;
    source?.close();
  }

  protected override fill(): boolean {
    // empty chunks are legal; keep pulling until text arrives or the source ends
    const before = this.limit;
    while (this.pull()) {
      if (this.limit > before) return true;
    }
    return false;
  }
}

export type TextCursor = BoundedCursor | StreamingCursor;
