/**
 * Minimal ZIP archive writer used for DOCX, EPUB and zipped Scrivener bundles.
 *
 * Entries keep call order. Each local record is assembled as soon as it is
 * added, so the central directory offsets are the running byte count at that
 * moment. No Zip64, no extra fields, no comments.
 */

import * as zlib from 'zlib';
import { crc32 } from './crc32';
import { EncodingError } from '../errors';

const LOCAL_FILE_HEADER_SIGNATURE = 0x04034b50;
const CENTRAL_DIRECTORY_SIGNATURE = 0x02014b50;
const END_OF_CENTRAL_DIRECTORY_SIGNATURE = 0x06054b50;

const METHOD_STORED = 0;
const METHOD_DEFLATE = 8;

const VERSION_STORED = 10;
const VERSION_DEFLATE = 20;

// General purpose bit 11: filename is UTF-8
const FLAG_UTF8 = 0x0800;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

interface CentralRecord {
  name: Buffer;
  flags: number;
  method: number;
  versionNeeded: number;
  crc: number;
  compressedSize: number;
  uncompressedSize: number;
  localHeaderOffset: number;
}

export interface DosDateTime {
  date: number;
  time: number;
}

/**
 * Packs a local time into the MS-DOS date/time bitfields. Dates before 1980
 * clamp to 1980-01-01 00:00:00.
 */
export function toDosDateTime(value: Date): DosDateTime {
  if (value.getFullYear() < 1980) {
    return { date: (1 << 5) | 1, time: 0 };
  }
  const date =
    ((value.getFullYear() - 1980) << 9) | ((value.getMonth() + 1) << 5) | value.getDate();
  const time =
    (value.getHours() << 11) | (value.getMinutes() << 5) | Math.floor(value.getSeconds() / 2);
  return { date, time };
}

export class ZipArchiveWriter {
  private localChunks: Buffer[] = [];
  private records: CentralRecord[] = [];
  private offset = 0;
  private readonly stamp: DosDateTime;

  constructor(modified: Date = new Date()) {
    this.stamp = toDosDateTime(modified);
  }

  get entryCount(): number {
    return this.records.length;
  }

  addEntry(entryPath: string, contents: Uint8Array | string, compress = true): void {
    const name = encodeEntryName(entryPath);
    const data = typeof contents === 'string' ? Buffer.from(contents, 'utf8') : Buffer.from(contents);
    const checksum = crc32(data);

    let payload: Buffer = data;
    let method = METHOD_STORED;
    if (compress && data.length > 0) {
      const deflated = tryDeflate(data);
      if (deflated && deflated.length < data.length) {
        payload = deflated;
        method = METHOD_DEFLATE;
      }
    }

    const flags = /^[\x00-\x7f]*$/.test(entryPath) ? 0 : FLAG_UTF8;
    const versionNeeded = method === METHOD_DEFLATE ? VERSION_DEFLATE : VERSION_STORED;

    const header = Buffer.alloc(30);
    header.writeUInt32LE(LOCAL_FILE_HEADER_SIGNATURE, 0);
    header.writeUInt16LE(versionNeeded, 4);
    header.writeUInt16LE(flags, 6);
    header.writeUInt16LE(method, 8);
    header.writeUInt16LE(this.stamp.time, 10);
    header.writeUInt16LE(this.stamp.date, 12);
    header.writeUInt32LE(checksum, 14);
    header.writeUInt32LE(payload.length, 18);
    header.writeUInt32LE(data.length, 22);
    header.writeUInt16LE(name.length, 26);
    header.writeUInt16LE(0, 28);

    this.records.push({
      name,
      flags,
      method,
      versionNeeded,
      crc: checksum,
      compressedSize: payload.length,
      uncompressedSize: data.length,
      localHeaderOffset: this.offset,
    });

    this.localChunks.push(header, name, payload);
    this.offset += header.length + name.length + payload.length;
  }

  finalize(): Buffer {
    const centralChunks: Buffer[] = [];
    let centralSize = 0;

    for (const record of this.records) {
      const entry = Buffer.alloc(46);
      entry.writeUInt32LE(CENTRAL_DIRECTORY_SIGNATURE, 0);
      entry.writeUInt16LE(VERSION_DEFLATE, 4); // version made by
      entry.writeUInt16LE(record.versionNeeded, 6);
      entry.writeUInt16LE(record.flags, 8);
      entry.writeUInt16LE(record.method, 10);
      entry.writeUInt16LE(this.stamp.time, 12);
      entry.writeUInt16LE(this.stamp.date, 14);
      entry.writeUInt32LE(record.crc, 16);
      entry.writeUInt32LE(record.compressedSize, 20);
      entry.writeUInt32LE(record.uncompressedSize, 24);
      entry.writeUInt16LE(record.name.length, 28);
      entry.writeUInt16LE(0, 30); // extra
      entry.writeUInt16LE(0, 32); // comment
      entry.writeUInt16LE(0, 34); // disk
      entry.writeUInt16LE(0, 36); // internal attributes
      entry.writeUInt32LE(0, 38); // external attributes
      entry.writeUInt32LE(record.localHeaderOffset, 42);

      centralChunks.push(entry, record.name);
      centralSize += entry.length + record.name.length;
    }

    const end = Buffer.alloc(22);
    end.writeUInt32LE(END_OF_CENTRAL_DIRECTORY_SIGNATURE, 0);
    end.writeUInt16LE(0, 4);
    end.writeUInt16LE(0, 6);
    end.writeUInt16LE(this.records.length, 8);
    end.writeUInt16LE(this.records.length, 10);
    end.writeUInt32LE(centralSize, 12);
    end.writeUInt32LE(this.offset, 16);
    end.writeUInt16LE(0, 20);

    return Buffer.concat([...this.localChunks, ...centralChunks, end]);
  }
}

function encodeEntryName(entryPath: string): Buffer {
  if (entryPath.length === 0) {
    throw new EncodingError(entryPath, 'name is empty');
  }
  if (LONE_SURROGATE.test(entryPath)) {
    throw new EncodingError(entryPath, 'name contains an unpaired surrogate');
  }
  const name = Buffer.from(entryPath, 'utf8');
  if (name.length > 0xffff) {
    throw new EncodingError(entryPath, 'name is longer than 65535 bytes');
  }
  return name;
}

function tryDeflate(data: Buffer): Buffer | null {
  try {
    return zlib.deflateRawSync(data);
  } catch {
    // Stored entries are always valid
    return null;
  }
}
