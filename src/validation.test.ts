import { describe, expect, it } from 'vitest';

import {
  ValidationError,
  asNonEmptyString,
  asOptionalPositiveInteger,
  asOptionalVector3,
  asRecord,
  asVector3,
  hasPathEscape,
  valueType,
} from './validation.js';

describe('field parsers', () => {
  it('accepts a three-number list as a vector', () => {
    expect(asVector3([1.5, -2, 0], 'location')).toEqual([1.5, -2, 0]);
  });

  it('rejects vectors of the wrong length with the field name', () => {
    try {
      asVector3([1, 2], 'location');
      throw new Error('expected a validation failure');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      const typed = error as ValidationError;
      expect(typed.field).toBe('location');
      expect(typed.receivedType).toBe('array');
      expect(typed.message).toBe(
        'Invalid field "location": expected list of 3 numbers',
      );
    }
  });

  it('names the offending vector component', () => {
    expect(() => asVector3([0, 'up', 0], 'offset')).toThrow(
      'Invalid field "offset[1]": expected number, got string',
    );
  });

  it('treats null and undefined as absent for optional parsers', () => {
    expect(asOptionalVector3(undefined, 'rotation')).toBeUndefined();
    expect(asOptionalVector3(null, 'rotation')).toBeUndefined();
    expect(asOptionalPositiveInteger(undefined, 'line_count')).toBeUndefined();
  });

  it('rejects blank strings and non-integer counts', () => {
    expect(() => asNonEmptyString('   ', 'actor_label')).toThrow(
      'Invalid field "actor_label": expected non-empty string',
    );
    expect(() => asOptionalPositiveInteger(2.5, 'line_count')).toThrow(
      'Invalid field "line_count": expected positive integer',
    );
  });

  it('rejects arrays where an object is required', () => {
    expect(() => asRecord([], 'args')).toThrow(
      'Invalid field "args": expected object, got array',
    );
  });

  it('reports JSON-ish value types', () => {
    expect(valueType(null)).toBe('null');
    expect(valueType([1])).toBe('array');
    expect(valueType(3)).toBe('number');
  });
});

describe('hasPathEscape', () => {
  it('flags parent segments and separators', () => {
    expect(hasPathEscape('../../etc')).toBe(true);
    expect(hasPathEscape('a/b')).toBe(true);
    expect(hasPathEscape('a\\b')).toBe(true);
  });

  it('allows plain module names', () => {
    expect(hasPathEscape('actor_actions')).toBe(false);
  });
});
