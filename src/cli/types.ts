/**
 * CLI result types - data shapes returned by command handlers
 * These enable --json output and testable data shapes
 */

import type { SearchUrls, Subject, SubjectStatistics } from '../types.js';

export interface InitResult {
  kind: 'init';
  success: boolean;
  alreadyInitialized: boolean;
  dataDir: string;
  message: string;
}

// ============================================
// Subject results
// ============================================

export interface SubjectAddResult {
  kind: 'subject-add';
  id: number;
  name: string;
}

export interface SubjectListResult {
  kind: 'subject-list';
  subjects: Subject[];
  count: number;
  filters: {
    status: string | null;
    riskLevel: string | null;
  };
}

export interface SubjectRemoveResult {
  kind: 'subject-remove';
  id: number;
  removed: boolean;
}

export interface StatsResult {
  kind: 'stats';
  stats: SubjectStatistics;
}

// ============================================
// Search results
// ============================================

export interface SearchResult {
  kind: 'search';
  name: string;
  nameFa: string | null;
  urls: SearchUrls;
}

// ============================================
// Union type for all results
// ============================================

export type CliResult =
  | InitResult
  | SubjectAddResult
  | SubjectListResult
  | SubjectRemoveResult
  | StatsResult
  | SearchResult;

// ============================================
// Output options
// ============================================

export interface OutputOptions {
  json?: boolean;
}
