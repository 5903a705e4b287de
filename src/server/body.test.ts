import { describe, expect, it } from 'vitest';
import { MalformedRequestError } from '../errors.js';
import { optionalInteger, parseId, parseSubjectUpdate, requiredString, toBoolean } from './body.js';

describe('server/body', () => {
  describe('parseId', () => {
    it('should accept base-10 integers', () => {
      expect(parseId('42')).toBe(42);
      expect(parseId('-3')).toBe(-3);
    });

    it('should reject anything else', () => {
      for (const raw of ['abc', '4.2', '1e3', '', '12abc', '99999999999999999999']) {
        expect(() => parseId(raw)).toThrow(new MalformedRequestError('Invalid ID'));
      }
    });
  });

  it('should read absent required strings as empty', () => {
    expect(requiredString({}, 'name')).toBe('');
    expect(requiredString({ name: null }, 'name')).toBe('');
    expect(() => requiredString({ name: 5 }, 'name')).toThrow('name must be a string');
  });

  it('should read integers from numbers or digit strings', () => {
    expect(optionalInteger({ subject_id: 7 }, 'subject_id')).toBe(7);
    expect(optionalInteger({ subject_id: ' 8 ' }, 'subject_id')).toBe(8);
    expect(optionalInteger({ subject_id: '' }, 'subject_id')).toBeUndefined();
    expect(() => optionalInteger({ subject_id: 1.5 }, 'subject_id')).toThrow(
      'subject_id must be an integer'
    );
  });

  it('should read booleans and 0/1', () => {
    expect(toBoolean(true, 'verified')).toBe(true);
    expect(toBoolean(0, 'verified')).toBe(false);
    expect(() => toBoolean('yes', 'verified')).toThrow('verified must be a boolean');
    expect(() => toBoolean(undefined, 'verified')).toThrow(MalformedRequestError);
  });

  describe('parseSubjectUpdate', () => {
    it('should keep known fields and skip read-only ones', () => {
      expect(
        parseSubjectUpdate({
          id: 3,
          created_at: '2024-01-01T00:00:00.000Z',
          status: 'Investigating',
          country: null,
          sanctions_checked: 1,
        })
      ).toEqual({ status: 'Investigating', country: null, sanctions_checked: true });
    });

    it('should reject unknown fields', () => {
      expect(() => parseSubjectUpdate({ password: 'x' })).toThrow('Unknown field: password');
    });

    it('should reject non-scalar values', () => {
      expect(() => parseSubjectUpdate({ notes: ['a'] })).toThrow('notes must be a string or null');
      expect(() => parseSubjectUpdate({ status: null })).toThrow('status must be a string');
    });
  });
});
