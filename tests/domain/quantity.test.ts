import { describe, expect, it } from 'vitest';
import { formatBytes, parseCpuQuantity, parseMemoryQuantity } from '../../src/domain/quantity.js';

describe('parseCpuQuantity', () => {
  it('reads millicores and whole cores', () => {
    expect(parseCpuQuantity('250m')).toBe(0.25);
    expect(parseCpuQuantity('2')).toBe(2);
    expect(parseCpuQuantity(1.5)).toBe(1.5);
  });

  it('returns undefined for missing or unparsable values', () => {
    expect(parseCpuQuantity(undefined)).toBeUndefined();
    expect(parseCpuQuantity('lots')).toBeUndefined();
  });
});

describe('parseMemoryQuantity', () => {
  it('reads binary and decimal suffixes', () => {
    expect(parseMemoryQuantity('512Mi')).toBe(512 * 1024 * 1024);
    expect(parseMemoryQuantity('1G')).toBe(1e9);
    expect(parseMemoryQuantity('1048576')).toBe(1048576);
  });

  it('rejects unknown suffixes', () => {
    expect(parseMemoryQuantity('3Xi')).toBeUndefined();
  });
});

describe('formatBytes', () => {
  it('picks a binary unit', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(2 * 1024 ** 3)).toBe('2.0 GiB');
    expect(formatBytes(0)).toBe('0');
  });
});
