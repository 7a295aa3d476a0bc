import inquirer from 'inquirer';
import type { UserInterface } from '@patchloop/core';

export class ConsoleUI implements UserInterface {
  constructor(private readonly isTTY: boolean = Boolean(process.stdin.isTTY)) {}

  async confirm(message: string, details?: string, defaultNo?: boolean): Promise<boolean> {
    // Nobody can answer without a terminal; treat it as "no".
    if (!this.isTTY) return false;
    if (details) {
      console.log('\n' + details + '\n');
    }
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message: message,
        default: !defaultNo,
      },
    ]);
    return confirmed;
  }
}
