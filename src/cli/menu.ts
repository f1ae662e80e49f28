/**
 * Interactive menu loop.
 */

import type { Logger } from "../observability/logging.js";
import type { MenuCommand } from "./commands.js";
import type { Prompter } from "./prompt.js";

/**
 * Show the numbered commands until the user picks Quit. A failing command is
 * reported and the loop carries on.
 */
export async function runMenu(
  commands: readonly MenuCommand[],
  prompter: Prompter,
  logger: Logger,
  print: (line: string) => void = console.log
): Promise<void> {
  for (;;) {
    print("What would you like to do? Enter the number.");
    commands.forEach((command, index) => print(`${index}: ${command.description}`));
    print(`${commands.length}: Quit`);

    const answer = (await prompter.ask("Enter your selection: ")).trim();
    if (!/^[+-]?\d+$/.test(answer)) {
      logger.error("Enter a number.");
      continue;
    }

    const selection = Number.parseInt(answer, 10);
    if (selection < 0 || selection > commands.length) {
      logger.error("Selection not recognized.");
      continue;
    }
    if (selection === commands.length) {
      return;
    }

    try {
      await commands[selection].run();
    } catch (error) {
      logger.error("Error running command. Please try again.");
      logger.error(error instanceof Error ? error.message : String(error));
    }
  }
}
