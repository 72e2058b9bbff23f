/**
 * Operator Input
 *
 * Everything the engine asks the operator goes through InputProvider,
 * so non-interactive callers can supply canned answers.
 */

import readline from 'readline';
import { ValidationError } from '../errors/index.js';

export interface RangeAnswer {
  fromCpId: string;
  toCpId: string;
}

export interface InputProvider {
  getRange(): Promise<RangeAnswer>;
  getReferenceTime(): Promise<string>;
  /** Resolves true only for an explicit "yes" */
  confirm(question: string): Promise<boolean>;
  close(): void;
}

/**
 * Only a literal "yes" counts; "y" does not
 */
export function isYes(answer: string): boolean {
  return answer.trim().toLowerCase() === 'yes';
}

/**
 * Prompts on stdin/stdout
 *
 * The readline interface is only created on the first question, so a fully
 * scripted invocation never holds stdin open. Once input ends, every pending
 * and later question gets no answer: confirmations count as "no", and the
 * checkpoint range and reference time throw.
 */
export class ReadlineInputProvider implements InputProvider {
  private rl: readline.Interface | null = null;
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  private open(): readline.Interface {
    if (!this.rl) {
      const rl = readline.createInterface({ input: this.input, output: this.output });
      rl.once('close', () => {
        this.ended = true;
      });
      this.rl = rl;
    }
    return this.rl;
  }

  private ask(question: string): Promise<string | null> {
    if (this.ended) return Promise.resolve(null);
    const rl = this.open();
    return new Promise((resolve) => {
      const onClose = () => resolve(null);
      rl.once('close', onClose);
      rl.question(question, (answer) => {
        rl.off('close', onClose);
        resolve(answer.trim());
      });
    });
  }

  private async askRequired(question: string, field: string): Promise<string> {
    const answer = await this.ask(question);
    if (answer === null) {
      throw new ValidationError(`Input ended before ${field} was entered`, field);
    }
    return answer;
  }

  async getRange(): Promise<RangeAnswer> {
    const fromCpId = await this.askRequired('From checkpoint ID: ', 'from_cp_id');
    const toCpId = await this.askRequired('To checkpoint ID: ', 'to_cp_id');
    return { fromCpId, toCpId };
  }

  getReferenceTime(): Promise<string> {
    return this.askRequired('Reference time (seconds): ', 'ref_time');
  }

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} (yes/no): `);
    return answer !== null && isYes(answer);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
