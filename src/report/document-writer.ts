import fs from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { describeError } from "../logger.js";
import type { Logger } from "../logger.js";
import { CATEGORY_ORDER, Category } from "../ingest/types.js";
import type { FileEntry } from "../ingest/types.js";
import type { DocumentStats, DocumentWriteOptions, OutputSink } from "./types.js";

export const CATEGORY_DESCRIPTIONS: Readonly<Record<Category, string>> = {
  [Category.Docs]: "Immutable documentation. Provided FOR REFERENCE ONLY.",
  [Category.Src]: "Source code files.",
  [Category.Other]: "Other files.",
};

/**
 * Emit the pseudo-XML document. Nothing is escaped: paths and content that
 * look like markup pass through unchanged.
 *
 * Each file is opened before its block starts, so a file that vanished since
 * the walk is skipped whole, and a category left with no readable files is
 * omitted.
 */
export async function writeDocument(
  entries: readonly FileEntry[],
  sink: OutputSink,
  options: DocumentWriteOptions,
): Promise<DocumentStats> {
  // A failed write reaches the write callback and is also emitted as 'error'.
  let sinkError: unknown;
  const onSinkError = (error: Error): void => {
    sinkError ??= error;
  };
  sink.on("error", onSinkError);

  let failed = false;
  try {
    return await emitDocument(entries, sink, options);
  } catch (error) {
    failed = true;
    throw sinkError ?? error;
  } finally {
    // A destroyed sink may emit after the callback has already rejected.
    if (!failed) {
      sink.removeListener("error", onSinkError);
    }
  }
}

async function emitDocument(
  entries: readonly FileEntry[],
  sink: OutputSink,
  options: DocumentWriteOptions,
): Promise<DocumentStats> {
  let categories = 0;
  let filesWritten = 0;
  let filesSkipped = 0;
  let bytesWritten = 0;

  for (const category of CATEGORY_ORDER) {
    let opened = false;
    for (const entry of entries) {
      if (entry.category !== category) {
        continue;
      }

      const handle = await openForStreaming(entry, options.logger);
      if (!handle) {
        filesSkipped += 1;
        continue;
      }

      try {
        if (!opened) {
          await writeText(sink, renderCategoryOpen(category));
          opened = true;
          categories += 1;
        }
        await writeText(sink, renderFileOpen(entry));
        bytesWritten += await streamContent(handle, entry, sink, options.logger);
        await writeText(sink, FILE_CLOSE);
      } finally {
        await handle.close();
      }
      filesWritten += 1;
    }

    if (opened) {
      await writeText(sink, CATEGORY_CLOSE);
    }
  }

  if (options.task !== undefined) {
    await writeText(sink, `<task>${options.task}</task>\n`);
  }

  return { categories, filesWritten, filesSkipped, bytesWritten };
}

const FILE_CLOSE = "\n      </content>\n    </file>\n";
const CATEGORY_CLOSE = "  </files>\n</category>\n";

function renderCategoryOpen(category: Category): string {
  return [
    "<category>",
    `  <description>${CATEGORY_DESCRIPTIONS[category]}</description>`,
    "  <files>",
    "",
  ].join("\n");
}

function renderFileOpen(entry: FileEntry): string {
  return [
    "    <file>",
    `      <path>${entry.relativePath}</path>`,
    "      <content>",
    "",
  ].join("\n");
}

async function openForStreaming(
  entry: FileEntry,
  logger: Logger,
): Promise<FileHandle | null> {
  try {
    return await fs.open(entry.absolutePath, "r");
  } catch (error) {
    logger.warn(`Skipping ${entry.relativePath}: ${describeError(error)}`);
    return null;
  }
}

/**
 * Copy the file into the sink chunk by chunk. A read failure part way ends
 * the content early with a warning; a sink failure propagates.
 */
async function streamContent(
  handle: FileHandle,
  entry: FileEntry,
  sink: OutputSink,
  logger: Logger,
): Promise<number> {
  const stream = handle.createReadStream({ autoClose: false });
  const chunks = stream[Symbol.asyncIterator]();
  let total = 0;
  try {
    for (;;) {
      let next: IteratorResult<unknown>;
      try {
        next = await chunks.next();
      } catch (error) {
        logger.warn(
          `Content of ${entry.relativePath} truncated: ${describeError(error)}`,
        );
        break;
      }
      if (next.done) {
        break;
      }
      const chunk = Buffer.isBuffer(next.value)
        ? next.value
        : Buffer.from(String(next.value));
      await writeText(sink, chunk);
      total += chunk.length;
    }
  } finally {
    stream.destroy();
  }
  return total;
}

async function writeText(sink: OutputSink, data: string | Buffer): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    sink.write(data, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
