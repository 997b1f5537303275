import { describe, it, expect } from 'vitest';
import JSZip from 'jszip';
import { ZipArchiveWriter, toDosDateTime } from './zipArchiveWriter';
import { EncodingError } from '../errors';

describe('toDosDateTime', () => {
  it('packs local date and time fields', () => {
    const stamp = toDosDateTime(new Date(2024, 2, 5, 14, 30, 10));
    expect(stamp.date).toBe(((2024 - 1980) << 9) | (3 << 5) | 5);
    expect(stamp.time).toBe((14 << 11) | (30 << 5) | 5);
  });

  it('clamps dates before 1980', () => {
    expect(toDosDateTime(new Date(1975, 0, 1))).toEqual({ date: 33, time: 0 });
  });
});

describe('ZipArchiveWriter', () => {
  it('writes signatures and counts entries', () => {
    const writer = new ZipArchiveWriter();
    writer.addEntry('a.txt', 'alpha');
    writer.addEntry('dir/b.txt', 'beta');
    const zip = writer.finalize();

    expect(writer.entryCount).toBe(2);
    expect(zip.readUInt32LE(0)).toBe(0x04034b50);
    const end = zip.length - 22;
    expect(zip.readUInt32LE(end)).toBe(0x06054b50);
    expect(zip.readUInt16LE(end + 10)).toBe(2);
  });

  it('stores the first entry uncompressed when asked', () => {
    const writer = new ZipArchiveWriter();
    writer.addEntry('mimetype', 'application/epub+zip', false);
    const zip = writer.finalize();

    expect(zip.readUInt16LE(8)).toBe(0);
    expect(zip.subarray(30, 38).toString('ascii')).toBe('mimetype');
    expect(zip.subarray(38, 58).toString('ascii')).toBe('application/epub+zip');
  });

  it('stores entries that deflate would not shrink', () => {
    const writer = new ZipArchiveWriter();
    writer.addEntry('digits.txt', '123456789', true);
    const zip = writer.finalize();
    const central = zip.readUInt32LE(zip.length - 22 + 16);

    expect(zip.readUInt32LE(central)).toBe(0x02014b50);
    expect(zip.readUInt16LE(8)).toBe(0);
    expect(zip.readUInt16LE(central + 10)).toBe(0);
    expect(zip.readUInt32LE(18)).toBe(9);
    expect(zip.readUInt32LE(14)).toBe(0xcbf43926);
    expect(zip.readUInt32LE(central + 16)).toBe(0xcbf43926);
  });

  it('writes the same checksum in local and central headers of deflated entries', () => {
    const writer = new ZipArchiveWriter();
    writer.addEntry('long.txt', 'a'.repeat(1000));
    const zip = writer.finalize();
    const central = zip.readUInt32LE(zip.length - 22 + 16);

    expect(zip.readUInt16LE(8)).toBe(8);
    expect(zip.readUInt16LE(central + 10)).toBe(8);
    expect(zip.readUInt32LE(18)).toBeLessThan(1000);
    expect(zip.readUInt32LE(central + 16)).toBe(zip.readUInt32LE(14));
  });

  it('produces an archive other readers can open', async () => {
    const writer = new ZipArchiveWriter();
    writer.addEntry('notes/chapter one.txt', 'Once upon a time. '.repeat(50));
    writer.addEntry('notes/café.md', '# Résumé');
    writer.addEntry('empty.txt', '');

    const archive = await JSZip.loadAsync(writer.finalize());
    expect(Object.keys(archive.files).sort()).toEqual(['empty.txt', 'notes/café.md', 'notes/chapter one.txt']);
    expect(await archive.file('notes/chapter one.txt')?.async('string')).toBe('Once upon a time. '.repeat(50));
    expect(await archive.file('notes/café.md')?.async('string')).toBe('# Résumé');
    expect(await archive.file('empty.txt')?.async('string')).toBe('');
  });

  it('rejects names it cannot encode', () => {
    const writer = new ZipArchiveWriter();
    expect(() => writer.addEntry('', 'x')).toThrow(EncodingError);
    expect(() => writer.addEntry('bad\uD800name', 'x')).toThrow('unpaired surrogate');
  });
});
