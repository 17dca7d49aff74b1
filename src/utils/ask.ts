/**
 * One-off terminal questions outside the shell
 */

import * as readline from 'readline';

/**
 * Check if we can show interactive prompts
 */
export function canInteract(): boolean {
  return process.stdin.isTTY === true && process.stderr.isTTY === true;
}

/**
 * Ask on stderr so stdout stays clean for results
 */
export function askQuestion(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}
