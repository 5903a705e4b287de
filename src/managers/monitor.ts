import { MAX_ACTIVE_MONITORS } from '../config.js';
import { isUniqueViolation, type Store } from '../db/store.js';
import { CapacityError, DuplicateError } from '../errors.js';
import { logger } from '../logger.js';
import type { NewsSource, NewsSourceRow, TwitterAccount, TwitterAccountRow } from '../types.js';
import { requireText, timestamp, toFlag } from './common.js';

const SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Strip surrounding whitespace and any leading '@' from a handle.
 */
export function normalizeUsername(username: string): string {
  return username.trim().replace(/^@+/, '').trim();
}

/**
 * Prefix https:// when the URL carries no scheme.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  return SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function rowToTwitterAccount(row: TwitterAccountRow): TwitterAccount {
  return { ...row, is_active: row.is_active === 1 };
}

function rowToNewsSource(row: NewsSourceRow): NewsSource {
  return { ...row, is_active: row.is_active === 1 };
}

/**
 * Monitored Twitter accounts and news sources, each capped at
 * MAX_ACTIVE_MONITORS active entries.
 */
export class MonitorManager {
  constructor(
    private readonly store: Store,
    private readonly maxActive: number = MAX_ACTIVE_MONITORS
  ) {}

  // ============================================
  // Twitter accounts
  // ============================================

  addTwitter(username: string, description?: string): { id: number; username: string } {
    const handle = requireText(normalizeUsername(username), 'Username is required');

    const id = this.guardUnique('Account already exists', () =>
      this.store.transaction(() => {
        if (this.store.count('twitter_accounts', { is_active: 1 }) >= this.maxActive) {
          throw new CapacityError(`Maximum ${this.maxActive} accounts reached`);
        }
        const existing = this.store.queryOne<{ id: number }>(
          'SELECT id FROM twitter_accounts WHERE username = ?',
          [handle]
        );
        if (existing) {
          throw new DuplicateError('Account already exists');
        }
        return this.store.insert('twitter_accounts', {
          username: handle,
          description: description ?? null,
          is_active: 1,
          created_at: timestamp(),
        });
      })
    );

    logger.added('monitor', id, { username: handle });
    return { id, username: handle };
  }

  getTwitter(id: number): TwitterAccount | null {
    const row = this.store.queryOne<TwitterAccountRow>(
      'SELECT * FROM twitter_accounts WHERE id = ?',
      [id]
    );
    return row ? rowToTwitterAccount(row) : null;
  }

  listTwitter(): TwitterAccount[] {
    return this.store
      .query<TwitterAccountRow>(
        'SELECT * FROM twitter_accounts WHERE is_active = 1 ORDER BY created_at DESC, id DESC'
      )
      .map(rowToTwitterAccount);
  }

  setTwitterActive(id: number, active: boolean): void {
    this.store.transaction(() => {
      const current = this.getTwitter(id);
      if (!current || current.is_active === active) return;
      if (active && this.store.count('twitter_accounts', { is_active: 1 }) >= this.maxActive) {
        throw new CapacityError(`Maximum ${this.maxActive} accounts reached`);
      }
      this.store.update('twitter_accounts', id, {
        is_active: toFlag(active),
        updated_at: timestamp(),
      });
    });
  }

  deleteTwitter(id: number): void {
    this.store.delete('twitter_accounts', id);
    logger.removed('monitor', id);
  }

  // ============================================
  // News sources
  // ============================================

  addNews(name: string, url: string, description?: string): { id: number; name: string } {
    const label = requireText(name, 'Name is required');
    const normalized = normalizeUrl(requireText(url, 'URL is required'));

    const id = this.guardUnique('Source already exists', () =>
      this.store.transaction(() => {
        if (this.store.count('news_sources', { is_active: 1 }) >= this.maxActive) {
          throw new CapacityError(`Maximum ${this.maxActive} sources reached`);
        }
        const existing = this.store.queryOne<{ id: number }>(
          'SELECT id FROM news_sources WHERE url = ?',
          [normalized]
        );
        if (existing) {
          throw new DuplicateError('Source already exists');
        }
        return this.store.insert('news_sources', {
          name: label,
          url: normalized,
          description: description ?? null,
          is_active: 1,
          created_at: timestamp(),
        });
      })
    );

    logger.added('monitor', id, { url: normalized });
    return { id, name: label };
  }

  getNews(id: number): NewsSource | null {
    const row = this.store.queryOne<NewsSourceRow>('SELECT * FROM news_sources WHERE id = ?', [id]);
    return row ? rowToNewsSource(row) : null;
  }

  listNews(): NewsSource[] {
    return this.store
      .query<NewsSourceRow>(
        'SELECT * FROM news_sources WHERE is_active = 1 ORDER BY created_at DESC, id DESC'
      )
      .map(rowToNewsSource);
  }

  setNewsActive(id: number, active: boolean): void {
    this.store.transaction(() => {
      const current = this.getNews(id);
      if (!current || current.is_active === active) return;
      if (active && this.store.count('news_sources', { is_active: 1 }) >= this.maxActive) {
        throw new CapacityError(`Maximum ${this.maxActive} sources reached`);
      }
      this.store.update('news_sources', id, {
        is_active: toFlag(active),
        updated_at: timestamp(),
      });
    });
  }

  deleteNews(id: number): void {
    this.store.delete('news_sources', id);
    logger.removed('monitor', id);
  }

  /**
   * Report a UNIQUE index violation the same way as the explicit lookup.
   */
  private guardUnique<R>(message: string, write: () => R): R {
    try {
      return write();
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateError(message);
      }
      throw err;
    }
  }
}
