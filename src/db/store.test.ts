import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isUniqueViolation, openStore, type Store } from './store.js';

describe('db/store', () => {
  let store: Store;

  beforeEach(() => {
    store = openStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('should assign increasing ids on insert', () => {
    const first = store.insert('user_contacts', { name: 'A', created_at: '2024-01-01T00:00:00.000Z' });
    const second = store.insert('user_contacts', { name: 'B', created_at: '2024-01-01T00:00:00.000Z' });

    expect(second).toBeGreaterThan(first);
  });

  it('should update only the supplied fields', () => {
    const id = store.insert('user_contacts', {
      name: 'Desk',
      email: 'desk@example.org',
      created_at: '2024-01-01T00:00:00.000Z',
    });

    store.update('user_contacts', id, { phone: '+10000000000' });

    const row = store.queryOne<{ name: string; email: string; phone: string }>(
      'SELECT name, email, phone FROM user_contacts WHERE id = ?',
      [id]
    );
    expect(row).toEqual({ name: 'Desk', email: 'desk@example.org', phone: '+10000000000' });
  });

  it('should ignore updates and deletes for missing ids', () => {
    expect(() => store.update('subjects', 999, { notes: 'x' })).not.toThrow();
    expect(() => store.delete('subjects', 999)).not.toThrow();
    expect(store.count('subjects')).toBe(0);
  });

  it('should count with an equality filter', () => {
    const now = '2024-01-01T00:00:00.000Z';
    store.insert('twitter_accounts', { username: 'a', is_active: 1, created_at: now });
    store.insert('twitter_accounts', { username: 'b', is_active: 0, created_at: now });
    store.insert('twitter_accounts', { username: 'c', is_active: 1, created_at: now });

    expect(store.count('twitter_accounts')).toBe(3);
    expect(store.count('twitter_accounts', { is_active: 1 })).toBe(2);
  });

  it('should reject columns outside the table', () => {
    // Not a fresh literal, so the extra key passes the compiler like a parsed body would
    const fields = { name: 'x', created_at: 'now', bogus: 'y' };
    expect(() => store.insert('user_contacts', fields)).toThrow(
      'Unknown column "bogus" for table user_contacts'
    );
  });

  it('should propagate unique constraint violations', () => {
    const now = '2024-01-01T00:00:00.000Z';
    store.insert('news_sources', { name: 'One', url: 'https://example.com', created_at: now });

    let caught: unknown;
    try {
      store.insert('news_sources', { name: 'Two', url: 'https://example.com', created_at: now });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(Error);
    expect(isUniqueViolation(caught)).toBe(true);
    expect(isUniqueViolation(new Error('other'))).toBe(false);
  });

  it('should roll back a transaction that throws', () => {
    expect(() =>
      store.transaction(() => {
        store.insert('user_contacts', { name: 'Temp', created_at: 'now' });
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(store.count('user_contacts')).toBe(0);
  });

  it('should return the value of a committed transaction', () => {
    const id = store.transaction(() => store.insert('user_contacts', { name: 'Kept', created_at: 'now' }));

    expect(store.queryOne<{ name: string }>('SELECT name FROM user_contacts WHERE id = ?', [id])).toEqual({
      name: 'Kept',
    });
  });

  it('should return null from queryOne when nothing matches', () => {
    expect(store.queryOne('SELECT * FROM subjects WHERE id = ?', [1])).toBeNull();
  });
});
