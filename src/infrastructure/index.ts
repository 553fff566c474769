/**
 * Infrastructure layer - external adapters
 */

export * from './docker';
export { EnvironmentStore, type EnvironmentStoreOptions } from './environment-store';
export { CommandExecutor, type CommandOptions, type InteractiveResult } from './command-executor';
export { createInquirerPrompter, type Prompter, type PromptChoice } from './prompts';
export { createConsoleOutput, type Output } from './output';
