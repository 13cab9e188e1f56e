import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

import type { IPrompter, TextOptions } from '../src/prompter.js';

export const fixturePath = (name: string): string =>
  fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

export const loadFixture = (name: string): unknown =>
  JSON.parse(readFileSync(fixturePath(name), 'utf-8'));

/** Raw Transcribe pronunciation item. */
export const spoken = (content: string, start: number, end: number, speaker?: string) => ({
  type: 'pronunciation',
  start_time: start.toFixed(2),
  end_time: end.toFixed(2),
  alternatives: [{ confidence: '0.99', content }],
  ...(speaker ? { speaker_label: speaker } : {}),
});

export const punct = (content: string) => ({
  type: 'punctuation',
  alternatives: [{ confidence: '0.0', content }],
});

export const segment = (speaker: string, start: number, end: number) => ({
  speaker_label: speaker,
  start_time: start.toFixed(2),
  end_time: end.toFixed(2),
});

/**
 * Prompter that replays scripted answers in order. `select` answers are the
 * choice text; `confirm` answers are booleans.
 */
export class ScriptedPrompter implements IPrompter {
  readonly questions: string[] = [];
  private readonly answers: Array<string | boolean>;

  constructor(answers: Array<string | boolean>) {
    this.answers = [...answers];
  }

  private next(question: string): string | boolean {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer left for "${question}"`);
    }
    return answer;
  }

  async text(question: string, options: TextOptions = {}): Promise<string> {
    const answer = this.next(question);
    if (typeof answer !== 'string') throw new Error(`Expected text answer for "${question}"`);
    return answer.trim() || options.default || '';
  }

  async select<T extends string>(question: string, choices: readonly T[]): Promise<T> {
    const answer = this.next(question);
    const choice = choices.find((candidate) => candidate === answer);
    if (choice === undefined) throw new Error(`"${String(answer)}" is not one of the choices`);
    return choice;
  }

  async confirm(question: string): Promise<boolean> {
    const answer = this.next(question);
    if (typeof answer !== 'boolean') throw new Error(`Expected yes/no answer for "${question}"`);
    return answer;
  }

  get remaining(): number {
    return this.answers.length;
  }

  close(): void {}
}
