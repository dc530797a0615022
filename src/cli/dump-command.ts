import { loadConfig } from "../config/config-loader.js";
import type { KekConfig } from "../config/types.js";
import { CategoryMatcher } from "../ingest/category-matcher.js";
import { walkTrees } from "../ingest/tree-walker.js";
import type { FileEntry } from "../ingest/types.js";
import type { Logger } from "../logger.js";
import { writeDocument } from "../report/document-writer.js";
import { assertRedirectedOutput } from "../report/output-target.js";
import type { DocumentStats, OutputSink } from "../report/types.js";

export interface DumpOptions {
  /** Free-form arguments; joined with single spaces into the task. */
  readonly taskArgs: readonly string[];
  readonly sink: OutputSink;
  readonly logger: Logger;
  readonly workingDir?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly concurrency?: number;
}

export interface DumpResult {
  readonly config: KekConfig;
  readonly files: readonly FileEntry[];
  /** `null` when there was nothing to write. */
  readonly stats: DocumentStats | null;
}

/**
 * Check the output target, load configuration, walk the scan roots and
 * write the document. Fatal errors surface before anything is written.
 */
export async function runDumpCommand(options: DumpOptions): Promise<DumpResult> {
  assertRedirectedOutput(options.sink);

  const config = await loadConfig(options.logger, {
    workingDir: options.workingDir,
    env: options.env,
  });
  const matcher = CategoryMatcher.compile(config.category);

  const files = await walkTrees(config.scan, {
    matcher,
    logger: options.logger,
    workingDir: options.workingDir,
    concurrency: options.concurrency,
  });

  const task = options.taskArgs.length > 0 ? options.taskArgs.join(" ") : undefined;
  if (files.length === 0 && task === undefined) {
    return { config, files, stats: null };
  }

  const stats = await writeDocument(files, options.sink, {
    task,
    logger: options.logger,
  });
  return { config, files, stats };
}
