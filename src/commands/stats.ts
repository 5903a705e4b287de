import { output } from '../cli/output.js';
import type { OutputOptions, StatsResult } from '../cli/types.js';
import type { Store } from '../db/store.js';
import { SubjectManager } from '../managers/subjects.js';

export function getStats(store: Store): StatsResult {
  return {
    kind: 'stats',
    stats: new SubjectManager(store).statistics(),
  };
}

export function runStats(store: Store, options: OutputOptions = {}): void {
  output(getStats(store), options);
}
