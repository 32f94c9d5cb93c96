// src/core/expand/output.ts

/**
 * Append-only accumulator for expansion output.
 */
export class OutputBuffer {
  private parts: string[] = [];
  private size = 0;

  push(text: string): void {
    if (text.length === 0) return;
    this.parts.push(text);
    this.size += text.length;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    if (this.parts.length > 1) {
      this.parts = [this.parts.join("")];
    }
    return this.parts[0] ?? "";
  }
}
