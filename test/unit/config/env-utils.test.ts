import { parseList } from '@/config/env-utils';

describe('parseList', () => {
  test('should split on commas and newlines', () => {
    expect(parseList(' key-a ,\nkey-b,,\r\nkey-c')).toEqual(['key-a', 'key-b', 'key-c']);
  });

  test('should return an empty list for missing or blank input', () => {
    expect(parseList(undefined)).toEqual([]);
    expect(parseList('')).toEqual([]);
    expect(parseList(' , ')).toEqual([]);
  });

  test('should accept a custom delimiter', () => {
    expect(parseList('a;b; c', ';')).toEqual(['a', 'b', 'c']);
  });
});
