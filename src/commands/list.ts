import { output } from '../cli/output.js';
import type { OutputOptions, SubjectListResult } from '../cli/types.js';
import type { Store } from '../db/store.js';
import { SubjectManager } from '../managers/subjects.js';

export interface ListOptions extends OutputOptions {
  status?: string;
  risk?: string;
}

/**
 * Get subject list data (testable, no side effects)
 */
export function getSubjectList(
  store: Store,
  options: Omit<ListOptions, keyof OutputOptions>
): SubjectListResult {
  const subjects = new SubjectManager(store).list({
    status: options.status,
    risk_level: options.risk,
  });

  return {
    kind: 'subject-list',
    subjects,
    count: subjects.length,
    filters: {
      status: options.status ?? null,
      riskLevel: options.risk ?? null,
    },
  };
}

/**
 * CLI runner - outputs to console
 */
export function runList(store: Store, options: ListOptions): void {
  const result = getSubjectList(store, options);
  output(result, options);
}
