import * as fs from "fs";
import type { TextSource } from "../core/text/source";
import { fileSource } from "../core/text/source";

/**
 * Filesystem port interface.
 */
export interface FileSystemPort {
  exists(filePath: string): boolean;
  /** Open a file for streaming reads. Throws when the file cannot be opened. */
  openSource(filePath: string): TextSource;
}

export const nodeFileSystem: FileSystemPort = {
  exists(filePath) {
    return fs.existsSync(filePath);
  },
  openSource(filePath) {
    return fileSource(filePath);
  },
};
