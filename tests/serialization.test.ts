import { describe, it, expect } from 'vitest';
import { canonicalize } from '../src/core/serialization';

describe('canonicalize', () => {
  it('sorts keys and uses spaced separators', () => {
    expect(canonicalize({ b: 1, a: 'x', c: [true, null] })).toBe('{"a": "x", "b": 1, "c": [true, null]}');
  });

  it('sorts nested object keys', () => {
    expect(canonicalize({ outer: { z: 0, y: 1 } })).toBe('{"outer": {"y": 1, "z": 0}}');
  });

  it('escapes non-ASCII characters', () => {
    expect(canonicalize('café')).toBe('"caf\\u00e9"');
    expect(canonicalize({ 'ключ': 'é' })).toBe('{"\\u043a\\u043b\\u044e\\u0447": "\\u00e9"}');
  });

  it('keeps standard JSON escapes', () => {
    expect(canonicalize('a"b\n')).toBe('"a\\"b\\n"');
  });

  it('renders numbers the way JSON does', () => {
    expect(canonicalize([0, 1.5, -2, 1735689600])).toBe('[0, 1.5, -2, 1735689600]');
  });

  it('writes small fractions in exponent form', () => {
    expect(canonicalize([0.00001, 0.000012, 1e-7, -0.00005])).toBe('[1e-05, 1.2e-05, 1e-07, -5e-05]');
    expect(canonicalize([0.0001, 0.00015, 0.5])).toBe('[0.0001, 0.00015, 0.5]');
  });

  it('renders empty containers', () => {
    expect(canonicalize({})).toBe('{}');
    expect(canonicalize([])).toBe('[]');
  });
});
