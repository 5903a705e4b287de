import { output } from '../cli/output.js';
import type { OutputOptions, SubjectRemoveResult } from '../cli/types.js';
import type { Store } from '../db/store.js';
import { SubjectManager } from '../managers/subjects.js';

/**
 * Remove a subject and return result data (testable)
 */
export function doRemoveSubject(store: Store, id: number): SubjectRemoveResult {
  const subjects = new SubjectManager(store);
  const removed = subjects.get(id) !== null;
  subjects.delete(id);

  return {
    kind: 'subject-remove',
    id,
    removed,
  };
}

/**
 * CLI runner - outputs to console
 */
export function runRemove(store: Store, id: number, options: OutputOptions = {}): void {
  const result = doRemoveSubject(store, id);
  output(result, options);
}
