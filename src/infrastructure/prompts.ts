/**
 * Terminal prompts backed by inquirer
 */

import inquirer from 'inquirer';

export interface PromptChoice {
  name: string;
  value: string;
}

export interface Prompter {
  input: (message: string, defaultValue?: string) => Promise<string>;
  /** Hidden input; nothing is echoed */
  password: (message: string) => Promise<string>;
  select: (message: string, choices: PromptChoice[], defaultValue?: string) => Promise<string>;
}

export function createInquirerPrompter(): Prompter {
  return {
    async input(message: string, defaultValue?: string): Promise<string> {
      const { value } = await inquirer.prompt<{ value: string }>([
        {
          type: 'input',
          name: 'value',
          message,
          ...(defaultValue !== undefined ? { default: defaultValue } : {}),
        },
      ]);
      return String(value).trim();
    },

    async password(message: string): Promise<string> {
      const { value } = await inquirer.prompt<{ value: string }>([
        {
          type: 'password',
          name: 'value',
          message,
          mask: '',
        },
      ]);
      return String(value);
    },

    async select(message: string, choices: PromptChoice[], defaultValue?: string): Promise<string> {
      const { value } = await inquirer.prompt<{ value: string }>([
        {
          type: 'list',
          name: 'value',
          message,
          choices,
          ...(defaultValue !== undefined ? { default: defaultValue } : {}),
        },
      ]);
      return String(value);
    },
  };
}
