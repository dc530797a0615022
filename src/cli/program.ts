import { Command } from "commander";

export type TaskRunner = (taskArgs: string[]) => Promise<void>;

/**
 * Parse `argv` and hand every argument after the script name to `run`,
 * verbatim. Commander only supplies the program name and description: it
 * would drop `--` from the task, so the action reads `argv` directly.
 */
export async function runProgram(argv: readonly string[], run: TaskRunner): Promise<void> {
  const program = new Command();

  program
    .name("kek")
    .description(
      "Dump the working tree as categorized pseudo-XML. Arguments become the trailing <task>.",
    )
    .argument("[task...]", "Task description appended to the document")
    .helpOption(false)
    .allowUnknownOption()
    .allowExcessArguments()
    .action(async () => {
      await run(argv.slice(2));
    });

  await program.parseAsync([...argv]);
}
