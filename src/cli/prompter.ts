import { createInterface, type Interface } from 'node:readline/promises';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private rl: Interface | null = null;

  async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = createInterface({ input: process.stdin, output: process.stdout });
    }
    const answer = await this.rl.question(question);
    return answer.trim();
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
