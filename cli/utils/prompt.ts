import * as readline from "node:readline";
import chalk from "chalk";

export interface Prompter {
  confirm(question: string, defaultAnswer: boolean): Promise<boolean>;
  close(): void;
}

export function parseYesNo(answer: string, defaultAnswer: boolean): boolean | null {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "") return defaultAnswer;
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return null;
}

/**
 * Asks on the terminal; repeats the question until it gets y/n or Enter.
 * Once the input has ended every question is answered no.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  let rl: readline.Interface | null = null;
  let ended = false;

  // null: the input closed before a line arrived
  const ask = (prompt: string): Promise<string | null> => {
    if (ended) return Promise.resolve(null);
    if (!rl) {
      rl = readline.createInterface({ input, output });
      rl.once("close", () => {
        ended = true;
      });
    }
    const iface = rl;
    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      iface.once("close", onClose);
      iface.question(prompt, (line) => {
        iface.off("close", onClose);
        resolve(line);
      });
    });
  };

  return {
    async confirm(question, defaultAnswer) {
      const hint = defaultAnswer ? "[Y/n]" : "[y/N]";
      for (;;) {
        const line = await ask(chalk.yellow(`${question} ${hint} `));
        if (line === null) {
          output.write("\n");
          return false;
        }
        const answer = parseYesNo(line, defaultAnswer);
        if (answer !== null) return answer;
        output.write("Please answer y or n.\n");
      }
    },
    close() {
      rl?.close();
    },
  };
}

/** Answers every question the same way (--yes, or no terminal to ask on). */
export function createFixedPrompter(answer: boolean, onAsk?: (question: string) => void): Prompter {
  return {
    confirm(question) {
      onAsk?.(`${question} -> ${answer ? "yes" : "no"}`);
      return Promise.resolve(answer);
    },
    close() {},
  };
}
