import readline from "node:readline";
import type { Reporter } from "../report/reporter.js";

/** Asks the operator a yes/no question. */
export interface ConfirmationProvider {
  /** True when the provider never blocks on input. */
  readonly unattended: boolean;
  confirm(question: string): Promise<boolean>;
}

/** Answers every question with a fixed value without asking. */
export class AutoConfirmation implements ConfirmationProvider {
  readonly unattended = true;

  constructor(private readonly answer = true) {}

  async confirm(_question: string): Promise<boolean> {
    return this.answer;
  }
}

/**
 * Reads the answer from a terminal. Anything other than an answer starting
 * with y/Y is a decline, including an empty line.
 */
export class ReadlineConfirmation implements ConfirmationProvider {
  readonly unattended = false;

  constructor(
    private readonly reporter: Reporter,
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  async confirm(question: string): Promise<boolean> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    const answer = await new Promise<string | null>((resolve) => {
      // end of input (Ctrl-D, closed pipe) leaves the question unanswered
      rl.once("close", () => resolve(null));
      rl.question(this.reporter.promptText(question), (a) => {
        resolve(a);
      });
    });
    rl.close();
    if (answer === null) {
      this.output.write("\n");
      return false;
    }
    return /^[yY]/.test(answer.trim());
  }
}

/**
 * Pick the provider for this invocation: `--yes` or a non-interactive stdin
 * (CI, pipes) never prompts and proceeds.
 */
export function selectConfirmation(
  reporter: Reporter,
  opts: { yes?: boolean; isTTY?: boolean },
): ConfirmationProvider {
  if (opts.yes || !opts.isTTY) return new AutoConfirmation(true);
  return new ReadlineConfirmation(reporter);
}
