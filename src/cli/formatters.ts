/**
 * CLI formatters - pretty-print logic for each result type
 */

import { RISK_LEVELS, SUBJECT_STATUSES } from '../types.js';
import type {
  CliResult,
  InitResult,
  SearchResult,
  StatsResult,
  SubjectAddResult,
  SubjectListResult,
  SubjectRemoveResult,
} from './types.js';

// ============================================
// Main dispatcher
// ============================================

export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case 'init':
      return formatInit(result);
    case 'subject-add':
      return formatSubjectAdd(result);
    case 'subject-list':
      return formatSubjectList(result);
    case 'subject-remove':
      return formatSubjectRemove(result);
    case 'stats':
      return formatStats(result);
    case 'search':
      return formatSearch(result);
  }
}

export function formatInit(result: InitResult): string {
  if (result.alreadyInitialized) {
    return [
      'casefile is already initialized.',
      `Data directory: ${result.dataDir}`,
      'Schema checked; existing data was kept.',
    ].join('\n');
  }

  return [
    'casefile initialized successfully.',
    `Data directory: ${result.dataDir}`,
    '',
    'Next steps:',
    '  casefile add "Jane Doe" --location "Berlin"',
    '  casefile search "Jane Doe"',
    '  casefile serve',
  ].join('\n');
}

// ============================================
// Subject formatters
// ============================================

export function formatSubjectAdd(result: SubjectAddResult): string {
  return `Subject added: #${result.id} ${result.name}`;
}

export function formatSubjectList(result: SubjectListResult): string {
  if (result.count === 0) {
    return 'No subjects found.';
  }

  const lines: string[] = [`Subjects (${result.count} total):`, ''];

  for (const s of result.subjects) {
    const localized = s.name_fa ? ` / ${s.name_fa}` : '';
    lines.push(`  [${s.id}] ${s.name_en}${localized} - ${s.status} (${s.risk_level})`);
    if (s.location_spotted) lines.push(`    Location: ${s.location_spotted}`);
  }

  return lines.join('\n');
}

export function formatSubjectRemove(result: SubjectRemoveResult): string {
  if (result.removed) {
    return `Removed: #${result.id}`;
  }
  return `Not found: #${result.id}`;
}

/**
 * Known values first in their usual order, then anything written by hand.
 */
function groupLines(counts: Record<string, number>, known: readonly string[]): string[] {
  const extra = Object.keys(counts).filter((key) => !known.includes(key));
  return [...known, ...extra].map((key) => `  ${key}: ${counts[key] ?? 0}`);
}

export function formatStats(result: StatsResult): string {
  const { stats } = result;
  return [
    `Total subjects: ${stats.total}`,
    '',
    'By status:',
    ...groupLines(stats.by_status, SUBJECT_STATUSES),
    '',
    'By risk:',
    ...groupLines(stats.by_risk, RISK_LEVELS),
  ].join('\n');
}

// ============================================
// Search formatters
// ============================================

export function formatSearch(result: SearchResult): string {
  const lines: string[] = [`Search URLs for: ${result.name}`];

  for (const [category, links] of Object.entries(result.urls)) {
    lines.push('', category.toUpperCase());
    for (const [label, url] of Object.entries(links)) {
      lines.push(`  - ${label}: ${url}`);
    }
  }

  return lines.join('\n');
}
