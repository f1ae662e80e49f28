/**
 * Console prompting for the interactive demo.
 */

import * as readline from "readline/promises";
import { NoopLogger, type Logger } from "../observability/logging.js";

/**
 * Source of user answers.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter reading answers from a terminal.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;

  constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, output });
  }

  ask(question: string): Promise<string> {
    return this.rl.question(question);
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Prompter answering from a fixed script; throws once the script runs out.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${question}`);
    }
    return answer;
  }

  close(): void {
    this.answers.length = 0;
  }
}

export type InputValue = string | string[];

/**
 * How one value is asked for.
 *
 * `default` is only displayed: a blank answer to a field with a default
 * yields an empty string and the client applies its own fallback. Fields
 * without a default are required.
 */
export interface InputParameter {
  text: string;
  default?: string | number;
  processing?: (value: string) => InputValue | Promise<InputValue>;
}

export type InputParameters = Record<string, InputParameter>;

/**
 * Splits a comma-separated answer.
 */
export const commaList = (value: string): string[] => value.split(",");

/**
 * Collects answers for a set of parameters, in declaration order.
 */
export class UserInput {
  private readonly values = new Map<string, InputValue>();

  constructor(
    private readonly parameters: InputParameters,
    private readonly prompter: Prompter,
    private readonly logger: Logger = new NoopLogger()
  ) {}

  async collect(): Promise<void> {
    this.values.clear();
    for (const [key, parameter] of Object.entries(this.parameters)) {
      const raw = await this.ask(parameter);
      const value = parameter.processing ? await parameter.processing(raw) : raw;
      this.values.set(key, value);
    }
  }

  /**
   * Answer for a key as text; empty when blank or never asked.
   */
  text(key: string): string {
    const value = this.values.get(key);
    if (value === undefined) {
      return "";
    }
    return Array.isArray(value) ? value.join(",") : value;
  }

  /**
   * Answer for a key as text, or undefined when blank.
   */
  optional(key: string): string | undefined {
    return this.text(key) || undefined;
  }

  /**
   * Answer for a key as a list.
   */
  list(key: string): string[] {
    const value = this.values.get(key);
    if (value === undefined) {
      return [];
    }
    return Array.isArray(value) ? value : [value];
  }

  private async ask(parameter: InputParameter): Promise<string> {
    const hasDefault = parameter.default !== undefined && parameter.default !== "";
    const defaultText = hasDefault ? ` (defaults to ${parameter.default} if blank)` : "";

    let answer = (await this.prompter.ask(`Enter ${parameter.text}${defaultText}: `)).trim();
    while (!answer && !hasDefault) {
      this.logger.error(`${parameter.text} cannot be blank.`);
      answer = (await this.prompter.ask(`Please enter a ${parameter.text}: `)).trim();
    }
    return answer;
  }
}
