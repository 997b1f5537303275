import { describe, it, expect } from 'vitest';
import { crc32 } from './crc32';

describe('crc32', () => {
  it('matches the standard check value', () => {
    expect(crc32(Buffer.from('123456789', 'ascii'))).toBe(0xcbf43926);
  });

  it('is zero for empty input', () => {
    expect(crc32(new Uint8Array(0))).toBe(0);
  });

  it('continues from a seed', () => {
    const whole = crc32(Buffer.from('hello world'));
    const partial = crc32(Buffer.from(' world'), crc32(Buffer.from('hello')));
    expect(partial).toBe(whole);
  });
});
