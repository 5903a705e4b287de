import type { Store } from '../db/store.js';
import { ValidationError } from '../errors.js';
import { logger } from '../logger.js';
import type { Finding, FindingRow, Importance } from '../types.js';
import { requireText, timestamp, toFlag } from './common.js';

export interface NewFinding {
  title: string;
  finding_type?: string;
  description?: string;
  source_url?: string;
  source_name?: string;
  subject_id?: number | null;
  tags?: string;
  importance?: string;
  notes?: string;
}

export interface FindingFilter {
  finding_type?: string;
  importance?: string;
  subject_id?: number;
}

const DEFAULT_IMPORTANCE: Importance = 'Medium';

const SELECT_WITH_SUBJECT =
  'SELECT f.*, s.name_en AS subject_name FROM findings f LEFT JOIN subjects s ON f.subject_id = s.id';

function rowToFinding(row: FindingRow): Finding {
  return { ...row, verified: row.verified === 1 };
}

export class FindingsManager {
  constructor(private readonly store: Store) {}

  add(finding: NewFinding): number {
    const title = requireText(finding.title, 'Title is required');
    const subjectId = finding.subject_id ?? null;

    if (subjectId !== null) {
      const subject = this.store.queryOne<{ id: number }>('SELECT id FROM subjects WHERE id = ?', [
        subjectId,
      ]);
      if (!subject) {
        throw new ValidationError(`Subject ${subjectId} does not exist`);
      }
    }

    const id = this.store.insert('findings', {
      title,
      finding_type: finding.finding_type ?? null,
      description: finding.description ?? null,
      source_url: finding.source_url ?? null,
      source_name: finding.source_name ?? null,
      subject_id: subjectId,
      tags: finding.tags ?? null,
      importance: finding.importance || DEFAULT_IMPORTANCE,
      verified: 0,
      notes: finding.notes ?? null,
      created_at: timestamp(),
    });

    logger.added('findings', id, { title });
    return id;
  }

  get(id: number): Finding | null {
    const row = this.store.queryOne<FindingRow>(`${SELECT_WITH_SUBJECT} WHERE f.id = ?`, [id]);
    return row ? rowToFinding(row) : null;
  }

  list(filter: FindingFilter = {}): Finding[] {
    let sql = `${SELECT_WITH_SUBJECT} WHERE 1=1`;
    const params: Array<string | number> = [];

    if (filter.finding_type) {
      sql += ' AND f.finding_type = ?';
      params.push(filter.finding_type);
    }

    if (filter.importance) {
      sql += ' AND f.importance = ?';
      params.push(filter.importance);
    }

    if (filter.subject_id !== undefined) {
      sql += ' AND f.subject_id = ?';
      params.push(filter.subject_id);
    }

    sql += ' ORDER BY f.created_at DESC, f.id DESC';

    return this.store.query<FindingRow>(sql, params).map(rowToFinding);
  }

  verify(id: number, verified: boolean): void {
    this.store.update('findings', id, {
      verified: toFlag(verified),
      updated_at: timestamp(),
    });
    logger.updated('findings', id, ['verified']);
  }

  delete(id: number): void {
    this.store.delete('findings', id);
    logger.removed('findings', id);
  }
}
