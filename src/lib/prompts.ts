import readline from 'readline';
import { yellow, dim, cyan, red } from './colors.js';
import { UserCancelledError } from './errors.js';

/**
 * Option for prompt choices
 */
export interface PromptOption<T = string> {
  label: string;
  description?: string;
  value: T;
}

/**
 * Create a readline interface for prompts
 */
function createInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

/**
 * Prompt user to select from a list of options with values
 * Returns the value of the selected option
 */
export async function promptChoice<T>(prompt: string, options: PromptOption<T>[]): Promise<T> {
  const rl = createInterface();

  return new Promise((resolve, reject) => {
    console.log(`\n${yellow(prompt)}\n`);
    options.forEach((opt, i) => {
      console.log(`  ${cyan(`[${i}]`)} ${opt.label}`);
      if (opt.description) {
        console.log(`      ${dim(opt.description)}`);
      }
    });
    console.log();

    const ask = () => {
      rl.question(`Enter choice [0-${options.length - 1}]: `, (answer) => {
        const trimmed = answer.trim();

        if (!trimmed) {
          ask();
          return;
        }

        if (trimmed.toLowerCase() === 'q' || trimmed.toLowerCase() === 'quit') {
          rl.close();
          reject(new UserCancelledError());
          return;
        }

        const choice = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
        if (isNaN(choice) || choice >= options.length) {
          console.log(red(`Invalid choice. Please enter a number between 0 and ${options.length - 1}.`));
          ask();
          return;
        }

        rl.close();
        resolve(options[choice].value);
      });
    };

    rl.on('SIGINT', () => {
      rl.close();
      reject(new UserCancelledError());
    });

    ask();
  });
}

/**
 * Prompt user for yes/no confirmation
 */
export async function promptConfirm(prompt: string, defaultValue: boolean = false): Promise<boolean> {
  const rl = createInterface();
  const hint = defaultValue ? '[Y/n]' : '[y/N]';

  return new Promise((resolve, reject) => {
    rl.question(`${prompt} ${dim(hint)} `, (answer) => {
      rl.close();
      const trimmed = answer.trim().toLowerCase();

      if (!trimmed) {
        resolve(defaultValue);
        return;
      }

      if (trimmed === 'y' || trimmed === 'yes') {
        resolve(true);
        return;
      }

      if (trimmed === 'n' || trimmed === 'no') {
        resolve(false);
        return;
      }

      // Invalid input, use default
      resolve(defaultValue);
    });

    rl.on('SIGINT', () => {
      rl.close();
      reject(new UserCancelledError());
    });
  });
}

/**
 * Prompt user for text input
 */
export async function promptInput(prompt: string, defaultValue?: string): Promise<string> {
  const rl = createInterface();
  const hint = defaultValue ? dim(` [${defaultValue}]`) : '';

  return new Promise((resolve, reject) => {
    rl.question(`${prompt}${hint}: `, (answer) => {
      rl.close();
      const trimmed = answer.trim();

      if (!trimmed && defaultValue !== undefined) {
        resolve(defaultValue);
        return;
      }

      resolve(trimmed);
    });

    rl.on('SIGINT', () => {
      rl.close();
      reject(new UserCancelledError());
    });
  });
}
