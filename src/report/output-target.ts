import { OutputTargetError } from "../errors.js";
import type { OutputSink } from "./types.js";

export function assertRedirectedOutput(sink: OutputSink, programName = "kek"): void {
  if (sink.isTTY === true) {
    throw new OutputTargetError(
      `Program output must be piped to another command or redirected to a file. Example: ${programName} | your_command`,
    );
  }
}
