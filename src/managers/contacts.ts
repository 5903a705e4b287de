import type { Store } from '../db/store.js';
import { logger } from '../logger.js';
import type { PresetContact, UserContact, UserContactRow } from '../types.js';
import { requireText, timestamp } from './common.js';

export interface NewContact {
  name: string;
  contact_type?: string;
  email?: string;
  phone?: string;
  url?: string;
  description?: string;
  notes?: string;
}

/**
 * Built-in reference organizations plus contacts the investigator adds.
 */
export class ContactsManager {
  constructor(
    private readonly store: Store,
    private readonly presets: readonly PresetContact[] = []
  ) {}

  listPreset(): PresetContact[] {
    return this.presets.map((preset) => ({ ...preset }));
  }

  add(contact: NewContact): number {
    const name = requireText(contact.name, 'Name is required');

    const id = this.store.insert('user_contacts', {
      name,
      contact_type: contact.contact_type ?? null,
      email: contact.email ?? null,
      phone: contact.phone ?? null,
      url: contact.url ?? null,
      description: contact.description ?? null,
      notes: contact.notes ?? null,
      created_at: timestamp(),
    });

    logger.added('contacts', id, { name });
    return id;
  }

  get(id: number): UserContact | null {
    return this.store.queryOne<UserContactRow>('SELECT * FROM user_contacts WHERE id = ?', [id]);
  }

  listUser(): UserContact[] {
    return this.store.query<UserContactRow>(
      'SELECT * FROM user_contacts ORDER BY created_at DESC, id DESC'
    );
  }

  delete(id: number): void {
    this.store.delete('user_contacts', id);
    logger.removed('contacts', id);
  }
}
