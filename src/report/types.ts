import type { Logger } from "../logger.js";

export interface DocumentWriteOptions {
  /** Joined task arguments; omitted entirely when undefined. */
  readonly task?: string;
  readonly logger: Logger;
}

export interface DocumentStats {
  readonly categories: number;
  readonly filesWritten: number;
  readonly filesSkipped: number;
  /** File content bytes only, excluding markup. */
  readonly bytesWritten: number;
}

/** Where the document goes; `isTTY` is set by Node on terminal streams. */
export interface OutputSink extends NodeJS.WritableStream {
  readonly isTTY?: boolean;
}
