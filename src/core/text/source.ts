// src/core/text/source.ts
// Pull-based text sources for streaming cursors

import * as fs from "fs";
import { StringDecoder } from "string_decoder";

/**
 * TextSource: yields successive chunks of text, `undefined` once drained.
 * `close()` releases whatever the source holds; pulling afterwards yields
 * nothing.
 */
export interface TextSource {
  pull(): string | undefined;
  close(): void;
}

export function stringSource(chunks: Iterable<string>): TextSource {
  const it = chunks[Symbol.iterator]();
  let open = true;
  return {
    pull() {
      if (!open) return undefined;
      const r = it.next();
      return r.done ? undefined : r.value;
    },
    close() {
      open = false;
    },
  };
}

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Reads a file synchronously in fixed-size chunks. The descriptor is closed
 * at end of file, when a read throws, or on `close()`.
 */
export function fileSource(filePath: string, chunkSize = DEFAULT_CHUNK_SIZE): TextSource {
  const fd = fs.openSync(filePath, "r");
  const decoder = new StringDecoder("utf8");
  const chunk = Buffer.alloc(chunkSize);
  let open = true;

  const release = () => {
    if (!open) return;
    open = false;
    fs.closeSync(fd);
  };

  const read = (): number => {
    try {
      return fs.readSync(fd, chunk, 0, chunkSize, null);
    } catch (e) {
      release();
      throw e;
    }
  };

  return {
    pull() {
      while (open) {
        const n = read();
        if (n === 0) {
          release();
          const tail = decoder.end();
          return tail.length > 0 ? tail : undefined;
        }
        const text = decoder.write(chunk.subarray(0, n));
        // a chunk can end mid code point; keep reading until something decodes
        if (text.length > 0) return text;
      }
      return undefined;
    },
    close: release,
  };
}
