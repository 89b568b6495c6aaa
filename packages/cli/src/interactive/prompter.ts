// ABOUTME: The questions the interactive session asks, behind an interface.
// ABOUTME: InquirerPrompter is the terminal implementation; tests script their own.

import inquirer from "inquirer";

export type Validator = (input: string) => true | string;

export interface Choice<T extends string> {
  name: string;
  value: T;
}

export interface InputOptions {
  default?: string;
  validate?: Validator;
}

export interface Prompter {
  /** Numbered choice list; answers by number or arrow keys */
  select<T extends string>(message: string, choices: Choice<T>[], defaultValue?: T): Promise<T>;
  input(message: string, options?: InputOptions): Promise<string>;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}

export class InquirerPrompter implements Prompter {
  async select<T extends string>(
    message: string,
    choices: Choice<T>[],
    defaultValue?: T
  ): Promise<T> {
    // rawlist takes its default as an index
    const index = choices.findIndex((choice) => choice.value === defaultValue);
    const answers = await inquirer.prompt<{ value: T }>([
      {
        type: "rawlist",
        name: "value",
        message,
        choices,
        default: index >= 0 ? index : undefined
      }
    ]);
    return answers.value;
  }

  async input(message: string, options: InputOptions = {}): Promise<string> {
    const answers = await inquirer.prompt<{ value: string }>([
      {
        type: "input",
        name: "value",
        message,
        default: options.default,
        validate: options.validate
      }
    ]);
    return answers.value.trim();
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    const answers = await inquirer.prompt<{ value: boolean }>([
      {
        type: "confirm",
        name: "value",
        message,
        default: defaultValue
      }
    ]);
    return answers.value;
  }
}
