/**
 * CLI output architecture tests
 * Tests data shapes returned by command functions (not stdout)
 */

import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { existsSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { doAddSubject } from '../commands/add.js';
import { doInit } from '../commands/init.js';
import { getSubjectList } from '../commands/list.js';
import { doRemoveSubject } from '../commands/remove.js';
import { doSearch } from '../commands/search.js';
import { getStats } from '../commands/stats.js';
import { getStore, resetCache, setDataDir } from '../db/client.js';
import type { Subject } from '../types.js';
import { formatResult } from './formatters.js';
import { output } from './output.js';

const TEST_DIR = join(tmpdir(), `casefile-test-cli-${process.pid}-${Date.now()}`);

beforeAll(() => {
  resetCache();
  setDataDir(TEST_DIR);
});

afterAll(() => {
  resetCache();
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true });
  }
});

describe('CLI Result Types', () => {
  describe('init', () => {
    it('returns InitResult with correct shape', () => {
      const result = doInit();
      expect(result).toEqual({
        kind: 'init',
        success: true,
        alreadyInitialized: false,
        dataDir: TEST_DIR,
        message: 'casefile initialized successfully.',
      });
    });

    it('reports already initialized on second call', () => {
      expect(doInit().alreadyInitialized).toBe(true);
    });

    it('keeps existing data when run again', () => {
      const store = getStore();
      const added = doAddSubject(store, 'Kept', {});

      const result = doInit();
      expect(result.message).toBe('casefile is already initialized.');
      expect(getSubjectList(store, {}).subjects.map((s) => s.id)).toEqual([added.id]);

      doRemoveSubject(store, added.id);
    });

    it('formats a repeated init', () => {
      expect(formatResult(doInit())).toBe(
        [
          'casefile is already initialized.',
          `Data directory: ${TEST_DIR}`,
          'Schema checked; existing data was kept.',
        ].join('\n')
      );
    });
  });

  describe('subjects', () => {
    it('adds, lists and removes subjects', () => {
      const store = getStore();
      const added = doAddSubject(store, ' Jane Doe ', { location: 'Berlin' });
      expect(added.kind).toBe('subject-add');
      expect(added.name).toBe(' Jane Doe ');

      const list = getSubjectList(store, {});
      expect(list.count).toBe(1);
      expect(list.subjects[0].location_spotted).toBe('Berlin');
      expect(list.filters).toEqual({ status: null, riskLevel: null });

      expect(getSubjectList(store, { status: 'Verified' }).count).toBe(0);

      expect(doRemoveSubject(store, added.id)).toEqual({
        kind: 'subject-remove',
        id: added.id,
        removed: true,
      });
      expect(doRemoveSubject(store, added.id).removed).toBe(false);
    });

    it('reports statistics', () => {
      const store = getStore();
      doAddSubject(store, 'A', {});
      doAddSubject(store, 'B', {});

      const result = getStats(store);
      expect(result.stats.total).toBe(2);
      expect(result.stats.by_status).toEqual({ New: 2 });
    });
  });

  describe('search', () => {
    it('builds urls without touching the store', () => {
      const result = doSearch('Jane Doe', { fa: 'جین' });
      expect(result.kind).toBe('search');
      expect(result.nameFa).toBe('جین');
      expect(Object.keys(result.urls)).toContain('persian');
    });
  });
});

describe('formatters', () => {
  const subject: Subject = {
    id: 7,
    name_en: 'Jane Doe',
    name_fa: null,
    aliases: null,
    location_spotted: 'Berlin',
    country: null,
    event_description: null,
    linkedin_url: null,
    linkedin_headline: null,
    linkedin_companies: null,
    linkedin_education: null,
    twitter_url: null,
    sanctions_checked: false,
    sanctions_hits: null,
    risk_level: 'High',
    risk_indicators: null,
    status: 'Investigating',
    notes: null,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: null,
  };

  it('formats a subject list', () => {
    expect(
      formatResult({
        kind: 'subject-list',
        subjects: [subject],
        count: 1,
        filters: { status: null, riskLevel: null },
      })
    ).toBe(
      ['Subjects (1 total):', '', '  [7] Jane Doe - Investigating (High)', '    Location: Berlin'].join(
        '\n'
      )
    );
  });

  it('formats an empty list', () => {
    expect(
      formatResult({
        kind: 'subject-list',
        subjects: [],
        count: 0,
        filters: { status: null, riskLevel: null },
      })
    ).toBe('No subjects found.');
  });

  it('lists known groups first and then custom values', () => {
    const text = formatResult({
      kind: 'stats',
      stats: {
        total: 3,
        by_status: { New: 2, Archived: 1 },
        by_risk: { Unknown: 3 },
      },
    });

    expect(text).toBe(
      [
        'Total subjects: 3',
        '',
        'By status:',
        '  New: 2',
        '  Investigating: 0',
        '  Verified: 0',
        '  Archived: 1',
        '',
        'By risk:',
        '  Unknown: 3',
        '  Low: 0',
        '  Medium: 0',
        '  High: 0',
        '  Critical: 0',
      ].join('\n')
    );
  });

  it('formats search urls by category', () => {
    const text = formatResult({
      kind: 'search',
      name: 'X',
      nameFa: null,
      urls: { web_search: { google: 'https://www.google.com/search?q=X' } },
    });

    expect(text).toBe(
      ['Search URLs for: X', '', 'WEB_SEARCH', '  - google: https://www.google.com/search?q=X'].join(
        '\n'
      )
    );
  });

  it('formats removals', () => {
    expect(formatResult({ kind: 'subject-remove', id: 3, removed: false })).toBe('Not found: #3');
  });
});

describe('output', () => {
  it('prints JSON without the kind tag', () => {
    const printed = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      output({ kind: 'subject-remove', id: 3, removed: true }, { json: true });
      expect(printed).toHaveBeenCalledWith(JSON.stringify({ id: 3, removed: true }, null, 2));
    } finally {
      printed.mockRestore();
    }
  });

  it('prints the formatted text otherwise', () => {
    const printed = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      output({ kind: 'subject-remove', id: 3, removed: true });
      expect(printed).toHaveBeenCalledWith('Removed: #3');
    } finally {
      printed.mockRestore();
    }
  });
});
