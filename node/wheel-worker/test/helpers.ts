import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export async function makeTempDir(prefix = 'wheel-worker-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export type TreeFile = string | { content: string; mode: number };

/** Write `files` under `root`, creating parent directories and applying explicit modes. */
export async function writeTree(root: string, files: Record<string, TreeFile>): Promise<void> {
  for (const [rel, file] of Object.entries(files)) {
    const full = path.join(root, rel);
    await fs.mkdir(path.dirname(full), { recursive: true });
    const content = typeof file === 'string' ? file : file.content;
    await fs.writeFile(full, content);
    if (typeof file !== 'string') await fs.chmod(full, file.mode);
  }
}

export type CentralEntry = {
  name: string;
  versionMadeBy: number;
  dosTime: number;
  dosDate: number;
  externalAttr: number;
  size: number;
};

/** Entries of a zip's central directory, in stored order. */
export function readCentralDirectory(bytes: Uint8Array): CentralEntry[] {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  let eocd = -1;
  for (let i = buf.length - 22; i >= 0; i--) {
    if (buf.readUInt32LE(i) === 0x06054b50) {
      eocd = i;
      break;
    }
  }
  if (eocd < 0) throw new Error('end of central directory not found');
  const count = buf.readUInt16LE(eocd + 10);
  let offset = buf.readUInt32LE(eocd + 16);

  const entries: CentralEntry[] = [];
  for (let n = 0; n < count; n++) {
    if (buf.readUInt32LE(offset) !== 0x02014b50) throw new Error(`bad central header at ${offset}`);
    const nameLen = buf.readUInt16LE(offset + 28);
    const extraLen = buf.readUInt16LE(offset + 30);
    const commentLen = buf.readUInt16LE(offset + 32);
    entries.push({
      versionMadeBy: buf.readUInt16LE(offset + 4),
      dosTime: buf.readUInt16LE(offset + 12),
      dosDate: buf.readUInt16LE(offset + 14),
      size: buf.readUInt32LE(offset + 24),
      externalAttr: buf.readUInt32LE(offset + 38),
      name: buf.toString('utf-8', offset + 46, offset + 46 + nameLen),
    });
    offset += 46 + nameLen + extraLen + commentLen;
  }
  return entries;
}

export function unixMode(entry: CentralEntry): number {
  return entry.externalAttr >>> 16;
}
