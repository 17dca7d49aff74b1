/**
 * Confirmation for bulk writes: update/delete without where, drop_table
 */

import type { BulkWritePolicy } from '../types/index.js';

export type Confirmation = 'confirmed' | 'declined' | 'refused';

export interface Confirmer {
  /**
   * @param assumeYes - the caller passed --yes
   * @returns `declined` when the user said no, `refused` when nobody could be asked
   */
  confirm(message: string, assumeYes: boolean): Promise<Confirmation>;
}

export interface ConfirmerOptions {
  policy: BulkWritePolicy;
  /** Interactive yes/no question; absent when there is no terminal */
  ask?: (question: string) => Promise<string>;
}

const YES_ANSWERS: ReadonlySet<string> = new Set(['y', 'yes', 'д', 'да']);

export function isYes(answer: string): boolean {
  return YES_ANSWERS.has(answer.trim().toLowerCase());
}

export function createConfirmer(options: ConfirmerOptions): Confirmer {
  return {
    async confirm(message, assumeYes) {
      if (assumeYes || options.policy === 'allow') {
        return 'confirmed';
      }
      if (options.policy === 'require-flag' || !options.ask) {
        return 'refused';
      }
      const answer = await options.ask(`${message} [y/N] `);
      return isYes(answer) ? 'confirmed' : 'declined';
    },
  };
}

/** Confirms everything; for scripts and tests */
export const ALWAYS_CONFIRM: Confirmer = {
  confirm: async () => 'confirmed',
};
