import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openStore, type Store } from '../db/store.js';
import { ValidationError } from '../errors.js';
import type { PresetContact } from '../types.js';
import { ContactsManager } from './contacts.js';

const PRESETS: PresetContact[] = [
  {
    name: 'Example Rights Group',
    type: 'Human Rights',
    contact: 'help@example.org',
    url: 'https://example.org',
    description: 'Test organization',
  },
];

describe('managers/contacts', () => {
  let store: Store;
  let contacts: ContactsManager;

  beforeEach(() => {
    store = openStore(':memory:');
    contacts = new ContactsManager(store, PRESETS);
  });

  afterEach(() => {
    store.close();
  });

  it('should list presets without exposing the configured objects', () => {
    const listed = contacts.listPreset();
    expect(listed).toEqual(PRESETS);

    listed[0].name = 'Changed';
    expect(contacts.listPreset()[0].name).toBe('Example Rights Group');
  });

  it('should not store presets', () => {
    expect(contacts.listUser()).toEqual([]);
  });

  it('should require a name', () => {
    expect(() => contacts.add({ name: '' })).toThrow(ValidationError);
  });

  it('should store the name exactly as submitted', () => {
    const id = contacts.add({ name: ' C ' });
    expect(contacts.get(id)?.name).toBe(' C ');
  });

  it('should round-trip a user contact', () => {
    const id = contacts.add({
      name: 'Local Desk',
      contact_type: 'Journalism',
      email: 'desk@example.org',
      phone: '+10000000000',
      url: 'https://desk.example.org',
      description: 'Regional desk',
      notes: 'Prefers email',
    });

    expect(contacts.get(id)).toMatchObject({
      id,
      name: 'Local Desk',
      contact_type: 'Journalism',
      email: 'desk@example.org',
      phone: '+10000000000',
      url: 'https://desk.example.org',
      description: 'Regional desk',
      notes: 'Prefers email',
    });
  });

  it('should list newest first and delete idempotently', () => {
    const first = contacts.add({ name: 'First' });
    const second = contacts.add({ name: 'Second' });
    expect(contacts.listUser().map((c) => c.id)).toEqual([second, first]);

    contacts.delete(first);
    contacts.delete(first);
    expect(contacts.get(first)).toBeNull();
    expect(contacts.listUser().map((c) => c.id)).toEqual([second]);
  });
});
