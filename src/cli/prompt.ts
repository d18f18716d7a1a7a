import { createInterface } from "readline/promises";
import { Writable } from "stream";

export interface Prompter {
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  close(): void;
}

/**
 * Terminal prompter. The interface writes through a stream that can be muted
 * so hidden answers are never echoed.
 */
export class ReadlinePrompter implements Prompter {
  private muted = false;
  private readonly output: Writable;
  private readonly rl: ReturnType<typeof createInterface>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
    terminal: boolean = process.stdin.isTTY === true
  ) {
    this.output = new Writable({
      write: (chunk: Buffer | string, _encoding, callback) => {
        if (!this.muted) {
          output.write(chunk);
        }
        callback();
      }
    });
    this.rl = createInterface({ input, output: this.output, terminal });
  }

  async ask(question: string): Promise<string> {
    return (await this.rl.question(question)).trim();
  }

  async askSecret(question: string): Promise<string> {
    this.output.write(question);
    this.muted = true;
    try {
      return await this.rl.question("");
    } finally {
      this.muted = false;
      this.output.write("\n");
    }
  }

  close(): void {
    this.rl.close();
  }
}

function confirmPrompt(prompt: string | undefined, choices: string): string {
  return `${prompt ? `${prompt} ` : ""}Continue? (${choices}): `;
}

/** Yes unless the answer is "n". */
export async function continueYn(prompter: Prompter, prompt?: string): Promise<boolean> {
  const answer = (await prompter.ask(confirmPrompt(prompt, "Y/n"))).toUpperCase();
  return answer !== "N";
}

/** No unless the answer is "y". */
export async function continueyN(prompter: Prompter, prompt?: string): Promise<boolean> {
  const answer = (await prompter.ask(confirmPrompt(prompt, "y/N"))).toUpperCase();
  return answer === "Y";
}
