// ============================================
// STRATA - Prompts
// Terminal questions and the SQL preview shown before them
// ============================================

import * as readline from 'readline';
import type { PendingMigration } from '../migration/MigrationManager';

export function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise<string>(resolve => {
    rl.question(question, answer => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * `y`/`yes` in any case; an empty answer takes the default
 */
export function isAffirmative(answer: string, defaultYes: boolean = false): boolean {
  const trimmed = answer.trim();
  if (trimmed === '') return defaultYes;
  return /^y(es)?$/i.test(trimmed);
}

/**
 * Heading line, then every statement indented
 */
export function previewLines(pending: PendingMigration): string[] {
  return [
    `\n📝 ${pending.model.name} (${pending.changeSet.length} change(s))`,
    ...pending.statements.map(sql => `   ${sql.replace(/\n/g, '\n   ')}`)
  ];
}
