import inquirer from 'inquirer';
import { CancelledError } from '../utils/ErrorHandler.js';

export interface PromptOptions {
  default?: string;
  /** Ocultar lo que escribe el usuario */
  secret?: boolean;
}

/**
 * Entrada interactiva. Se inyecta para poder probar los flujos sin una terminal.
 */
export interface Prompter {
  input(message: string, options?: PromptOptions): Promise<string>;
}

export class InquirerPrompter implements Prompter {
  async input(message: string, options: PromptOptions = {}): Promise<string> {
    try {
      const question = options.secret
        ? { type: 'password' as const, name: 'value' as const, message, mask: '*' }
        : { type: 'input' as const, name: 'value' as const, message, default: options.default };

      const { value } = await inquirer.prompt<{ value: string }>([question]);
      return value.trim();
    } catch (error) {
      // Ctrl+C durante el prompt
      if (error instanceof Error && error.name === 'ExitPromptError') {
        throw new CancelledError();
      }
      throw error;
    }
  }
}
