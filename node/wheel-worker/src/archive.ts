import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { Zip, ZipDeflate } from 'fflate';
import type { FileEntry } from './collect.js';
import { WheelBuildError, describeError, isWheelBuildError } from './errors.js';
import { RecordBuilder, urlsafeB64, type ManifestRecord } from './record.js';

export const CHUNK_SIZE = 8 * 1024;
export const COMPRESSION_LEVEL = 6;

// DOS timestamps are stored in local time; building the dates from local components keeps
// the encoded fields the same in every time zone.
export const FILE_MTIME = new Date(1980, 0, 1, 0, 0, 0);
export const GENERATED_MTIME = new Date(2016, 0, 1, 0, 0, 0);

export const EXECUTABLE_MODE = 0o755;
export const NON_EXECUTABLE_MODE = 0o644;

const S_IFMT = 0o170000;
const S_IFREG = 0o100000;
const S_IFDIR = 0o040000;
const UNIX_HOST = 3;
const DOS_DIRECTORY_FLAG = 0x10;

export function normalizeFileMode(mode: number): number {
  return mode & 0o111 ? EXECUTABLE_MODE : NON_EXECUTABLE_MODE;
}

/** Zip external attributes: Unix type and normalized permission in the high 16 bits. */
export function externalAttributes(mode: number): number {
  const isDir = (mode & S_IFMT) === S_IFDIR;
  const unixMode = (isDir ? S_IFDIR : S_IFREG) | normalizeFileMode(mode);
  return unixMode * 0x10000 + (isDir ? DOS_DIRECTORY_FLAG : 0);
}

async function* readChunks(file: string): AsyncGenerator<Uint8Array> {
  const handle = await fs.open(file, 'r');
  try {
    for (;;) {
      const buf = new Uint8Array(CHUNK_SIZE);
      const { bytesRead } = await handle.read(buf, 0, CHUNK_SIZE, null);
      if (bytesRead === 0) return;
      yield buf.subarray(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}

/**
 * Streams entries into a zip file at `tempPath`. Each write hashes the exact bytes it
 * compresses and appends one record, in call order.
 */
export class ArchiveWriter {
  private readonly zip: Zip;
  private pending: Uint8Array[] = [];
  private zipError: Error | null = null;
  private readonly written = new Set<string>();
  private closed = false;

  private constructor(
    readonly tempPath: string,
    private readonly handle: FileHandle,
    private readonly records: RecordBuilder,
  ) {
    this.zip = new Zip((err, chunk) => {
      if (err) {
        this.zipError = err;
        return;
      }
      this.pending.push(chunk);
    });
  }

  static async open(tempPath: string, records: RecordBuilder): Promise<ArchiveWriter> {
    let handle: FileHandle | undefined;
    try {
      handle = await fs.open(tempPath, 'wx', NON_EXECUTABLE_MODE);
      await handle.chmod(NON_EXECUTABLE_MODE);
      return new ArchiveWriter(tempPath, handle, records);
    } catch (err: unknown) {
      if (handle) await handle.close();
      await fs.rm(tempPath, { force: true });
      throw new WheelBuildError('ArchiveWriteFailure', `cannot create ${tempPath}: ${describeError(err)}`, {
        path: tempPath,
      });
    }
  }

  async writeFile(entry: FileEntry): Promise<ManifestRecord> {
    this.claim(entry.archivePath);
    const source = entry.sourceLocation;
    let mode: number;
    let isDir: boolean;
    try {
      const stat = await fs.stat(source);
      mode = stat.mode;
      isDir = stat.isDirectory();
    } catch (err: unknown) {
      throw this.readFailure(source, err);
    }

    const zipEntry = this.newEntry(entry.archivePath, FILE_MTIME, externalAttributes(mode));
    const hash = createHash('sha256');
    let size = 0;
    if (!isDir) {
      try {
        for await (const chunk of readChunks(source)) {
          hash.update(chunk);
          size += chunk.length;
          zipEntry.push(chunk, false);
          await this.flush();
        }
      } catch (err: unknown) {
        if (isWheelBuildError(err)) throw err;
        throw this.readFailure(source, err);
      }
    }
    zipEntry.push(new Uint8Array(0), true);
    await this.flush();

    return this.record({ archivePath: entry.archivePath, contentHashBase64Url: urlsafeB64(hash.digest()), sizeBytes: size });
  }

  async writeGenerated(archivePath: string, content: Uint8Array): Promise<ManifestRecord> {
    const digest = createHash('sha256').update(content).digest();
    await this.writeBytes(archivePath, content);
    return this.record({ archivePath, contentHashBase64Url: urlsafeB64(digest), sizeBytes: content.length });
  }

  /** Write RECORD from everything recorded so far. The manifest itself is not recorded. */
  async writeManifest(recordPath: string): Promise<void> {
    await this.writeBytes(recordPath, this.records.render(recordPath));
  }

  /** Finish the zip and move it over `finalPath`, replacing any previous archive. */
  async commit(finalPath: string): Promise<void> {
    this.zip.end();
    await this.flush();
    await this.close();
    try {
      await fs.rename(this.tempPath, finalPath);
    } catch (err: unknown) {
      throw new WheelBuildError('ArchiveWriteFailure', `cannot move archive to ${finalPath}: ${describeError(err)}`, {
        path: finalPath,
      });
    }
  }

  async discard(): Promise<void> {
    this.zip.terminate();
    await this.close();
    await fs.rm(this.tempPath, { force: true });
  }

  private record(record: ManifestRecord): ManifestRecord {
    this.records.add(record);
    return record;
  }

  private async writeBytes(archivePath: string, content: Uint8Array): Promise<void> {
    this.claim(archivePath);
    const zipEntry = this.newEntry(archivePath, GENERATED_MTIME, externalAttributes(S_IFREG | NON_EXECUTABLE_MODE));
    zipEntry.push(content, true);
    await this.flush();
  }

  private claim(archivePath: string) {
    if (this.written.has(archivePath)) {
      throw new WheelBuildError('DuplicateArchivePath', `${archivePath} is already in the archive`, { archivePath });
    }
    this.written.add(archivePath);
  }

  private newEntry(archivePath: string, mtime: Date, attrs: number): ZipDeflate {
    const entry = new ZipDeflate(archivePath, { level: COMPRESSION_LEVEL });
    // read when the entry is added, so they must be set first
    entry.mtime = mtime;
    entry.os = UNIX_HOST;
    entry.attrs = attrs;
    this.zip.add(entry);
    return entry;
  }

  private async flush(): Promise<void> {
    if (this.zipError) {
      throw new WheelBuildError('ArchiveWriteFailure', `cannot compress archive: ${this.zipError.message}`, {
        path: this.tempPath,
      });
    }
    const chunks = this.pending;
    this.pending = [];
    try {
      for (const chunk of chunks) await this.handle.write(chunk);
    } catch (err: unknown) {
      throw new WheelBuildError('ArchiveWriteFailure', `cannot write ${this.tempPath}: ${describeError(err)}`, {
        path: this.tempPath,
      });
    }
  }

  private async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }

  private readFailure(source: string, err: unknown): WheelBuildError {
    return new WheelBuildError('SourceReadFailure', `cannot read ${source}: ${describeError(err)}`, { source });
  }
}
