import type { Context } from 'hono';
import { MalformedRequestError } from '../errors.js';
import { SUBJECT_UPDATABLE_FIELDS, type SubjectUpdate } from '../managers/subjects.js';

export type JsonObject = Record<string, unknown>;

// Sent back by the dashboard with full records; never written
const READ_ONLY_FIELDS = new Set(['id', 'created_at', 'updated_at']);

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a JSON object body. An empty body counts as `{}`.
 */
export async function readJsonBody(c: Context): Promise<JsonObject> {
  const text = await c.req.text();
  if (!text.trim()) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new MalformedRequestError('Invalid JSON body');
  }

  if (!isJsonObject(parsed)) {
    throw new MalformedRequestError('Invalid JSON body');
  }
  return parsed;
}

/**
 * Parse a path id segment. Only base-10 integers are accepted.
 */
export function parseId(raw: string): number {
  const id = /^-?\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(id)) {
    throw new MalformedRequestError('Invalid ID');
  }
  return id;
}

export function optionalString(body: JsonObject, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new MalformedRequestError(`${key} must be a string`);
  }
  return value;
}

/**
 * Required fields are read leniently; an absent value becomes '' and the
 * manager reports it as a validation error.
 */
export function requiredString(body: JsonObject, key: string): string {
  return optionalString(body, key) ?? '';
}

export function optionalInteger(body: JsonObject, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value === 'number' && Number.isSafeInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  throw new MalformedRequestError(`${key} must be an integer`);
}

export function toBoolean(value: unknown, key: string): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 1 || value === 0) return value === 1;
  throw new MalformedRequestError(`${key} must be a boolean`);
}

/**
 * Validate a PUT body for a subject against the updatable columns.
 */
export function parseSubjectUpdate(body: JsonObject): SubjectUpdate {
  const update: SubjectUpdate = {};

  for (const [key, value] of Object.entries(body)) {
    if (READ_ONLY_FIELDS.has(key)) continue;

    const field = SUBJECT_UPDATABLE_FIELDS.find((candidate) => candidate === key);
    if (!field) {
      throw new MalformedRequestError(`Unknown field: ${key}`);
    }

    if (field === 'sanctions_checked') {
      update.sanctions_checked = toBoolean(value, key);
    } else if (field === 'name_en' || field === 'risk_level' || field === 'status') {
      if (typeof value !== 'string') {
        throw new MalformedRequestError(`${key} must be a string`);
      }
      update[field] = value;
    } else if (value === null || typeof value === 'string') {
      update[field] = value;
    } else {
      throw new MalformedRequestError(`${key} must be a string or null`);
    }
  }

  return update;
}
