/**
 * Interactive prompts
 */

import inquirer from "inquirer";
import type { ConfirmPrompt } from "../command/types.js";

/**
 * Ask a yes/no question on the terminal.
 * A Ctrl-C while the question is displayed answers `interruptAnswer`.
 */
export const yesNoQuery: ConfirmPrompt = async (question, { defaultAnswer, interruptAnswer }) => {
  let resolveInterrupted: (answer: boolean) => void = () => undefined;
  const interrupted = new Promise<boolean>((resolve) => {
    resolveInterrupted = resolve;
  });
  const onInterrupt = (): void => resolveInterrupted(interruptAnswer);
  process.once("SIGINT", onInterrupt);

  try {
    const answered = inquirer
      .prompt<{ confirm: boolean }>([
        {
          type: "confirm",
          name: "confirm",
          message: question,
          default: defaultAnswer,
        },
      ])
      .then(({ confirm }) => confirm)
      // The prompt closes itself on Ctrl-C
      .catch(() => interruptAnswer);

    return await Promise.race([answered, interrupted]);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
};
