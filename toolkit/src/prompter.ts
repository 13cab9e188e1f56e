import { createInterface, type Interface } from 'readline/promises';

export interface TextOptions {
  /** Returned when the answer is blank. */
  default?: string;
}

export interface IPrompter {
  text(question: string, options?: TextOptions): Promise<string>;
  select<T extends string>(question: string, choices: readonly T[]): Promise<T>;
  confirm(question: string): Promise<boolean>;
  close(): void;
}

export class ReadlinePrompter implements IPrompter {
  private rl: Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
  }

  async text(question: string, options: TextOptions = {}): Promise<string> {
    const hint = options.default ? ` (${options.default})` : '';
    const answer = (await this.rl.question(`? ${question}${hint} `)).trim();
    return answer || options.default || '';
  }

  async select<T extends string>(question: string, choices: readonly T[]): Promise<T> {
    const menu = choices.map((choice, index) => `  ${index + 1}. ${choice}`).join('\n');
    for (;;) {
      const answer = await this.rl.question(`? ${question}\n${menu}\n> `);
      const choice = choices[Number(answer.trim()) - 1];
      if (choice !== undefined) return choice;
      console.log(`Please enter a number between 1 and ${choices.length}.`);
    }
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.rl.question(`? ${question} (y/n) `);
    return answer.trim().toLowerCase().startsWith('y');
  }

  close(): void {
    this.rl.close();
  }
}
