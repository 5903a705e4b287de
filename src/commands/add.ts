import { output } from '../cli/output.js';
import type { OutputOptions, SubjectAddResult } from '../cli/types.js';
import type { Store } from '../db/store.js';
import { SubjectManager } from '../managers/subjects.js';

export interface AddOptions extends OutputOptions {
  fa?: string;
  location?: string;
  event?: string;
  notes?: string;
}

/**
 * Add a subject and return result data (testable, no side effects)
 */
export function doAddSubject(
  store: Store,
  name: string,
  options: Omit<AddOptions, keyof OutputOptions>
): SubjectAddResult {
  const id = new SubjectManager(store).add({
    name_en: name,
    name_fa: options.fa,
    location: options.location,
    event: options.event,
    notes: options.notes,
  });

  return {
    kind: 'subject-add',
    id,
    name,
  };
}

/**
 * CLI runner - outputs to console
 */
export function runAdd(store: Store, name: string, options: AddOptions): void {
  const result = doAddSubject(store, name, options);
  output(result, options);
}
