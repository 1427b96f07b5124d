/**
 * Unit tests for SmartString
 */

import { describe, it, expect } from 'vitest';
import { SmartString } from './SmartString';

describe('SmartString', () => {
  const name = new SmartString('Ubuntu ISO');

  it('should match case-insensitively against lower case text', () => {
    expect(name.contains('ubuntu')).toBe(true);
    expect(name.eq('ubuntu iso')).toBe(true);
  });

  it('should match case-sensitively when the text has upper case letters', () => {
    expect(name.contains('Ubuntu')).toBe(true);
    expect(name.contains('UBUNTU')).toBe(false);
  });

  it('should compare against a number by length', () => {
    expect(new SmartString('abc').gt('2')).toBe(true);
    expect(new SmartString('abc').lt('4')).toBe(true);
    expect(new SmartString('12').compare('abc')).toBe(9);
  });

  it('should order other strings lexically', () => {
    expect(new SmartString('apple').lt('banana')).toBe(true);
    expect(new SmartString('apple').ge('apple')).toBe(true);
  });

  it('should count combined characters once', () => {
    expect(new SmartString('e\u0301').length).toBe(1);
  });
});
