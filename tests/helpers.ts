import fs from "node:fs/promises";
import path from "node:path";
import { Writable } from "node:stream";
import type { Logger } from "../src/logger.js";

export class MemorySink extends Writable {
  readonly chunks: Buffer[] = [];
  isTTY?: boolean;

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.chunks.push(Buffer.from(chunk));
    callback();
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return this.bytes().toString("utf8");
  }
}

export interface CollectingLogger extends Logger {
  readonly warnings: string[];
  readonly errors: string[];
}

export function createCollectingLogger(): CollectingLogger {
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    warnings,
    errors,
    warn: (message) => {
      warnings.push(message);
    },
    error: (message) => {
      errors.push(message);
    },
  };
}

export async function writeText(
  filePath: string,
  contents: string | Buffer,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
}

export async function mkdir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
