import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runDumpCommand } from "../../src/cli/dump-command.js";
import { ConfigError, OutputTargetError } from "../../src/errors.js";
import { MemorySink, createCollectingLogger, writeText } from "../helpers.js";
import type { CollectingLogger } from "../helpers.js";

let tempDir: string;
let logger: CollectingLogger;

beforeEach(async () => {
  tempDir = await fs.realpath(
    await fs.mkdtemp(path.join(os.tmpdir(), "kek-cli-")),
  );
  logger = createCollectingLogger();
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

async function seedProject(): Promise<void> {
  await writeText(path.join(tempDir, "README.md"), "# Demo\n");
  await writeText(path.join(tempDir, "src", "main.rs"), "fn main() {}\n");
  await writeText(path.join(tempDir, "notes.bin"), "raw\n");
}

async function dump(
  taskArgs: readonly string[] = [],
  env: NodeJS.ProcessEnv = {},
): Promise<{ sink: MemorySink; result: Awaited<ReturnType<typeof runDumpCommand>> }> {
  const sink = new MemorySink();
  const result = await runDumpCommand({ taskArgs, sink, logger, workingDir: tempDir, env });
  return { sink, result };
}

const SCENARIO_OUTPUT = [
  "<category>",
  "  <description>Immutable documentation. Provided FOR REFERENCE ONLY.</description>",
  "  <files>",
  "    <file>",
  "      <path>README.md</path>",
  "      <content>",
  "# Demo",
  "",
  "      </content>",
  "    </file>",
  "  </files>",
  "</category>",
  "<category>",
  "  <description>Source code files.</description>",
  "  <files>",
  "    <file>",
  "      <path>src/main.rs</path>",
  "      <content>",
  "fn main() {}",
  "",
  "      </content>",
  "    </file>",
  "  </files>",
  "</category>",
  "<category>",
  "  <description>Other files.</description>",
  "  <files>",
  "    <file>",
  "      <path>notes.bin</path>",
  "      <content>",
  "raw",
  "",
  "      </content>",
  "    </file>",
  "  </files>",
  "</category>",
  "",
].join("\n");

describe("runDumpCommand", () => {
  it("refuses to write to an interactive terminal", async () => {
    await seedProject();
    const sink = new MemorySink();
    sink.isTTY = true;

    await expect(
      runDumpCommand({ taskArgs: [], sink, logger, workingDir: tempDir, env: {} }),
    ).rejects.toThrow(OutputTargetError);
    expect(sink.bytes().length).toBe(0);
  });

  it("dumps the working tree grouped by category", async () => {
    await seedProject();

    const { sink, result } = await dump();

    expect(sink.text()).toBe(SCENARIO_OUTPUT);
    expect(result.stats).toEqual({
      categories: 3,
      filesWritten: 3,
      filesSkipped: 0,
      bytesWritten: 24,
    });
    expect(result.config.source).toBeNull();
    expect(logger.warnings).toEqual([]);
  });

  it("joins arguments into the trailing task", async () => {
    await seedProject();

    const { sink } = await dump(["Optimize", "code."]);

    expect(sink.text()).toBe(`${SCENARIO_OUTPUT}<task>Optimize code.</task>\n`);
  });

  it("writes nothing for an empty tree without a task", async () => {
    const { sink, result } = await dump();

    expect(result.stats).toBeNull();
    expect(sink.text()).toBe("");
  });

  it("writes only the task for an empty tree", async () => {
    const { sink } = await dump(["Explain", "this"]);

    expect(sink.text()).toBe("<task>Explain this</task>\n");
  });

  it("applies categories from KEK_CONFIG", async () => {
    await seedProject();
    await writeText(
      path.join(tempDir, "custom.toml"),
      ["[category]", "docs = []", 'src = ["*.md"]', ""].join("\n"),
    );

    const { result } = await dump([], { KEK_CONFIG: "custom.toml" });

    expect(result.files.map((file) => [file.relativePath, file.category])).toEqual([
      ["README.md", "src"],
      ["custom.toml", "other"],
      ["notes.bin", "other"],
      ["src/main.rs", "other"],
    ]);
  });

  it("limits the walk to configured scan roots", async () => {
    await seedProject();
    await writeText(path.join(tempDir, "kek.toml"), 'scan = ["src"]\n');

    const { result } = await dump();

    expect(result.files.map((file) => file.relativePath)).toEqual(["src/main.rs"]);
  });

  it("fails before writing when a pattern is invalid", async () => {
    await seedProject();
    await writeText(path.join(tempDir, "kek.toml"), '[category]\nsrc = ["[abc"]\n');
    const sink = new MemorySink();

    await expect(
      runDumpCommand({ taskArgs: ["x"], sink, logger, workingDir: tempDir, env: {} }),
    ).rejects.toThrow(ConfigError);
    expect(sink.bytes().length).toBe(0);
  });

  it("produces byte-identical output across runs", async () => {
    await seedProject();

    const first = await dump(["same"]);
    const second = await dump(["same"]);

    expect(first.sink.bytes().equals(second.sink.bytes())).toBe(true);
  });
});
