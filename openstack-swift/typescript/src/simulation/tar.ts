/**
 * Minimal tar archive support for bulk upload tests and the in-memory
 * server: regular files and directories, with PAX headers for long names.
 */

const BLOCK_SIZE = 512;

export class TarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TarError';
    Object.setPrototypeOf(this, TarError.prototype);
  }
}

export interface TarEntry {
  path: string;
  type: 'file' | 'directory';
  data: Buffer;
}

function writeString(header: Buffer, value: string, offset: number, length: number): void {
  header.write(value, offset, Math.min(Buffer.byteLength(value), length), 'utf8');
}

function writeOctal(header: Buffer, value: number, offset: number, length: number): void {
  writeString(header, `${value.toString(8).padStart(length - 1, '0')}\0`, offset, length);
}

function buildHeader(name: string, size: number, typeflag: string): Buffer {
  const header = Buffer.alloc(BLOCK_SIZE);
  writeString(header, name, 0, 100);
  writeOctal(header, typeflag === '5' ? 0o755 : 0o644, 100, 8);
  writeOctal(header, 0, 108, 8);
  writeOctal(header, 0, 116, 8);
  writeOctal(header, size, 124, 12);
  writeOctal(header, 0, 136, 12);
  header.write(typeflag, 156, 1, 'ascii');
  header.write('ustar\0', 257, 6, 'ascii');
  header.write('00', 263, 2, 'ascii');
  header.fill(' ', 148, 156);
  let checksum = 0;
  for (const byte of header) {
    checksum += byte;
  }
  writeString(header, `${checksum.toString(8).padStart(6, '0')}\0 `, 148, 8);
  return header;
}

function pad(data: Buffer): Buffer[] {
  const remainder = data.length % BLOCK_SIZE;
  return remainder === 0 ? [data] : [data, Buffer.alloc(BLOCK_SIZE - remainder)];
}

function paxRecord(key: string, value: string): Buffer {
  const content = ` ${key}=${value}\n`;
  const base = Buffer.byteLength(content);
  // the length prefix counts its own digits
  let length = base + String(base).length;
  while (length !== base + String(length).length) {
    length = base + String(length).length;
  }
  return Buffer.from(`${length}${content}`, 'utf8');
}

/**
 * Builds an uncompressed tar archive. Paths ending in `/` become directory
 * entries.
 */
export function buildTarArchive(files: Record<string, string | Uint8Array>): Buffer {
  const blocks: Buffer[] = [];
  for (const [path, content] of Object.entries(files)) {
    const isDirectory = path.endsWith('/');
    const data = isDirectory
      ? Buffer.alloc(0)
      : typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
    let name = path;
    if (Buffer.byteLength(path) > 100) {
      const pax = paxRecord('path', path);
      blocks.push(buildHeader('PaxHeader', pax.length, 'x'), ...pad(pax));
      name = path.slice(0, 100);
    }
    blocks.push(buildHeader(name, data.length, isDirectory ? '5' : '0'), ...pad(data));
  }
  blocks.push(Buffer.alloc(BLOCK_SIZE * 2));
  return Buffer.concat(blocks);
}

function readString(block: Buffer, offset: number, length: number): string {
  const field = block.subarray(offset, offset + length);
  const end = field.indexOf(0);
  return field.subarray(0, end < 0 ? field.length : end).toString('utf8');
}

function parsePax(data: Buffer): Record<string, string> {
  const records: Record<string, string> = {};
  let offset = 0;
  while (offset < data.length) {
    const space = data.indexOf(0x20, offset);
    if (space < 0) {
      throw new TarError('malformed PAX header');
    }
    const length = parseInt(data.subarray(offset, space).toString('ascii'), 10);
    if (!Number.isInteger(length) || length <= 0 || offset + length > data.length) {
      throw new TarError('malformed PAX header');
    }
    const record = data.subarray(space + 1, offset + length - 1).toString('utf8');
    const eq = record.indexOf('=');
    if (eq > 0) {
      records[record.slice(0, eq)] = record.slice(eq + 1);
    }
    offset += length;
  }
  return records;
}

function isZero(block: Buffer): boolean {
  return block.every((byte) => byte === 0);
}

/**
 * Reads the entries of an uncompressed tar archive.
 * @throws {TarError} if the archive is malformed
 */
export function readTarArchive(archive: Uint8Array): TarEntry[] {
  const bytes = Buffer.from(archive);
  const entries: TarEntry[] = [];
  let offset = 0;
  let longPath: string | undefined;

  while (offset < bytes.length) {
    if (bytes.length - offset < BLOCK_SIZE) {
      if (isZero(bytes.subarray(offset))) {
        break;
      }
      throw new TarError('truncated header');
    }
    const header = bytes.subarray(offset, offset + BLOCK_SIZE);
    if (isZero(header)) {
      break;
    }

    const stored = parseInt(readString(header, 148, 8).trim(), 8);
    let checksum = 0;
    for (let i = 0; i < BLOCK_SIZE; i++) {
      checksum += i >= 148 && i < 156 ? 0x20 : (header[i] ?? 0);
    }
    if (stored !== checksum) {
      throw new TarError('invalid header checksum');
    }

    const size = parseInt(readString(header, 124, 12).trim() || '0', 8);
    const typeflag = String.fromCharCode(header[156] ?? 0);
    const dataStart = offset + BLOCK_SIZE;
    if (dataStart + size > bytes.length) {
      throw new TarError('unexpected end of archive');
    }
    const data = bytes.subarray(dataStart, dataStart + size);
    offset = dataStart + Math.ceil(size / BLOCK_SIZE) * BLOCK_SIZE;

    if (typeflag === 'x') {
      longPath = parsePax(data).path;
      continue;
    }
    if (typeflag === 'g') {
      continue;
    }

    let path = readString(header, 0, 100);
    const prefix = readString(header, 345, 155);
    if (readString(header, 257, 6) === 'ustar' && prefix !== '') {
      path = `${prefix}/${path}`;
    }
    path = longPath ?? path;
    longPath = undefined;

    if (typeflag === '0' || typeflag === '\0') {
      entries.push({ path, type: 'file', data: Buffer.from(data) });
    } else if (typeflag === '5') {
      entries.push({ path, type: 'directory', data: Buffer.alloc(0) });
    }
  }

  return entries;
}
