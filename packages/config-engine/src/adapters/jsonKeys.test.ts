import { describe, expect, it } from 'vitest';
import { findDuplicateJsonKey } from './jsonKeys';

describe('findDuplicateJsonKey', () => {
  it('finds a repeated member in a nested object', () => {
    expect(findDuplicateJsonKey('{"groups":[{"name":"a","active":true,"name":"b"}]}')).toBe('name');
  });

  it('allows the same name in sibling objects and at different depths', () => {
    const text = '{"name":"root","groups":[{"name":"a"},{"name":"b","inner":{"name":"c"}}]}';
    expect(findDuplicateJsonKey(text)).toBeNull();
  });

  it('does not treat string values as member names', () => {
    expect(findDuplicateJsonKey('{"alias":"alias","list":["alias","alias"]}')).toBeNull();
  });

  it('handles escaped quotes and unicode escapes in names', () => {
    expect(findDuplicateJsonKey('{"a\\"b":1,"c":2,"a\\u0022b":3}')).toBe('a"b');
  });
});
