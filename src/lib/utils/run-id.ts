import { randomBytes } from 'node:crypto';

/** Short id for one run, 8 hex chars */
export function createRunId(): string {
  return randomBytes(4).toString('hex');
}
