import type { Store } from '../db/store.js';
import type { SubjectColumns } from '../db/schema.js';
import { logger } from '../logger.js';
import type { Subject, SubjectRow, SubjectStatistics } from '../types.js';
import { requireText, timestamp, toFlag } from './common.js';

export interface NewSubject {
  name_en: string;
  name_fa?: string;
  location?: string;
  event?: string;
  notes?: string;
}

export interface SubjectFilter {
  status?: string;
  risk_level?: string;
}

export type SubjectUpdate = Partial<Omit<Subject, 'id' | 'created_at' | 'updated_at'>>;

/** Fields a client may change through `update()` */
export const SUBJECT_UPDATABLE_FIELDS: ReadonlyArray<keyof SubjectUpdate> = [
  'name_en',
  'name_fa',
  'aliases',
  'location_spotted',
  'country',
  'event_description',
  'linkedin_url',
  'linkedin_headline',
  'linkedin_companies',
  'linkedin_education',
  'twitter_url',
  'sanctions_checked',
  'sanctions_hits',
  'risk_level',
  'risk_indicators',
  'status',
  'notes',
];

/**
 * Map database row to Subject interface.
 */
function rowToSubject(row: SubjectRow): Subject {
  return { ...row, sanctions_checked: row.sanctions_checked === 1 };
}

export class SubjectManager {
  constructor(private readonly store: Store) {}

  add(subject: NewSubject): number {
    const name = requireText(subject.name_en, 'Name is required');

    const id = this.store.insert('subjects', {
      name_en: name,
      name_fa: subject.name_fa ?? null,
      location_spotted: subject.location ?? null,
      event_description: subject.event ?? null,
      notes: subject.notes ?? null,
      status: 'New',
      risk_level: 'Unknown',
      created_at: timestamp(),
    });

    logger.added('subjects', id, { name });
    return id;
  }

  get(id: number): Subject | null {
    const row = this.store.queryOne<SubjectRow>('SELECT * FROM subjects WHERE id = ?', [id]);
    return row ? rowToSubject(row) : null;
  }

  list(filter: SubjectFilter = {}): Subject[] {
    let sql = 'SELECT * FROM subjects WHERE 1=1';
    const params: string[] = [];

    if (filter.status) {
      sql += ' AND status = ?';
      params.push(filter.status);
    }

    if (filter.risk_level) {
      sql += ' AND risk_level = ?';
      params.push(filter.risk_level);
    }

    sql += ' ORDER BY created_at DESC, id DESC';

    return this.store.query<SubjectRow>(sql, params).map(rowToSubject);
  }

  /**
   * Merge the supplied fields into a subject. Status and risk values are not
   * checked against the known sets. Unknown ids are ignored.
   */
  update(id: number, fields: SubjectUpdate): void {
    const { sanctions_checked, name_en, ...text } = fields;
    const columns: Partial<SubjectColumns> = { ...text, updated_at: timestamp() };

    if (name_en !== undefined) {
      columns.name_en = requireText(name_en, 'Name is required');
    }
    if (sanctions_checked !== undefined) {
      columns.sanctions_checked = toFlag(sanctions_checked);
    }

    this.store.update('subjects', id, columns);
    logger.updated('subjects', id, Object.keys(fields));
  }

  /**
   * Hard delete. Findings that reference the subject keep their subject_id.
   */
  delete(id: number): void {
    this.store.delete('subjects', id);
    logger.removed('subjects', id);
  }

  statistics(): SubjectStatistics {
    const byStatus = this.store.query<{ status: string; count: number }>(
      'SELECT status, COUNT(*) AS count FROM subjects GROUP BY status'
    );
    const byRisk = this.store.query<{ risk_level: string; count: number }>(
      'SELECT risk_level, COUNT(*) AS count FROM subjects GROUP BY risk_level'
    );

    return {
      total: this.store.count('subjects'),
      by_status: Object.fromEntries(byStatus.map((r) => [r.status, r.count])),
      by_risk: Object.fromEntries(byRisk.map((r) => [r.risk_level, r.count])),
    };
  }
}
