// src/core/text/span.ts
// Source spans computed from buffer offsets

import type { TextBuffer } from "./buffer";

export interface Span {
  file?: string;
  startLine?: number;
  startCol?: number;
  endLine?: number;
  endCol?: number;
}

export type LineCol = { line: number; col: number };

/**
 * 1-based line and column of `offset` within `buffer`.
 */
export function lineColAt(buffer: TextBuffer, offset: number): LineCol {
  const front = buffer.slice(0, offset);
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < front.length; i++) {
    if (front.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, col: offset - lineStart + 1 };
}

export function spanOf(buffer: TextBuffer, file: string, start: number, end: number): Span {
  const from = lineColAt(buffer, start);
  const to = lineColAt(buffer, end);
  return {
    file,
    startLine: from.line,
    startCol: from.col,
    endLine: to.line,
    endCol: to.col,
  };
}

export function formatSpan(span: Span): string {
  return `${span.file ?? "<unknown>"}:${span.startLine ?? 0}:${span.startCol ?? 0}`;
}
