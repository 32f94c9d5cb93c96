// src/core/text/buffer.ts
// Append-only text shared by cursors, range views and macro definitions

/**
 * TextBuffer: growable text whose existing contents never change.
 *
 * Offsets handed out against a buffer stay valid for its whole lifetime,
 * so definitions can keep (offset, length) spans instead of copies.
 */
export class TextBuffer {
  private text: string;

  constructor(initial = "") {
    this.text = initial;
  }

  static from(text: string): TextBuffer {
    return new TextBuffer(text);
  }

  get length(): number {
    return this.text.length;
  }

  append(chunk: string): void {
    if (chunk.length > 0) this.text += chunk;
  }

  slice(start: number, end: number = this.text.length): string {
    return this.text.slice(start, end);
  }

  codePointAt(index: number): number | undefined {
    return this.text.codePointAt(index);
  }

  charCodeAt(index: number): number {
    return this.text.charCodeAt(index);
  }

  toString(): string {
    return this.text;
  }
}
