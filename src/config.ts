import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { PresetContact } from './types.js';

export const DEFAULT_PORT = 8000;

/** Active entries allowed per monitored source type */
export const MAX_ACTIVE_MONITORS = 10;

const BUNDLED_PRESETS = fileURLToPath(new URL('../config/preset-contacts.json', import.meta.url));

/**
 * Resolve the listening port: explicit value, then CASEFILE_PORT, then the default.
 */
export function getPort(explicit?: number): number {
  if (explicit !== undefined) return validatePort(explicit);

  const fromEnv = process.env.CASEFILE_PORT;
  if (fromEnv) return validatePort(Number.parseInt(fromEnv, 10));

  return DEFAULT_PORT;
}

function validatePort(port: number): number {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port: ${port}. Must be an integer between 1 and 65535.`);
  }
  return port;
}

export function getPresetContactsPath(): string {
  return process.env.CASEFILE_PRESETS || BUNDLED_PRESETS;
}

/**
 * Load the read-only reference organizations shown on the contacts page.
 */
export function loadPresetContacts(path: string = getPresetContactsPath()): PresetContact[] {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));

  if (!Array.isArray(parsed)) {
    throw new Error(`Preset contacts file must contain a JSON array: ${path}`);
  }

  return parsed.map((entry: unknown, index) => {
    if (!isPresetContact(entry)) {
      throw new Error(
        `Preset contact #${index} in ${path} needs string name, type, contact, url and description`
      );
    }
    return {
      name: entry.name,
      type: entry.type,
      contact: entry.contact,
      url: entry.url,
      description: entry.description,
    };
  });
}

function isPresetContact(value: unknown): value is PresetContact {
  if (typeof value !== 'object' || value === null) return false;
  const fields: Array<keyof PresetContact> = ['name', 'type', 'contact', 'url', 'description'];
  return fields.every((field) => field in value && typeof Reflect.get(value, field) === 'string');
}
