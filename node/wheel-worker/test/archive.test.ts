import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { unzipSync } from 'fflate';
import { beforeEach, describe, expect, it } from 'vitest';
import { ArchiveWriter, externalAttributes, normalizeFileMode } from '../src/archive.js';
import { RecordBuilder } from '../src/record.js';
import { pathExists } from '../src/utils.js';
import { makeTempDir, readCentralDirectory, unixMode, writeTree } from './helpers.js';

const sha256 = (data: string | Uint8Array) => createHash('sha256').update(data).digest('base64url');

describe('normalizeFileMode', () => {
  it('maps every mode to 0644 or 0755', () => {
    expect(normalizeFileMode(0o100777)).toBe(0o755);
    expect(normalizeFileMode(0o104755)).toBe(0o755);
    expect(normalizeFileMode(0o100610)).toBe(0o755);
    expect(normalizeFileMode(0o100666)).toBe(0o644);
    expect(normalizeFileMode(0o100600)).toBe(0o644);
  });

  it('keeps the file type and flags directories', () => {
    expect(externalAttributes(0o100600)).toBe(0o100644 * 0x10000);
    expect(externalAttributes(0o040700)).toBe(0o040755 * 0x10000 + 0x10);
  });
});

describe('RecordBuilder', () => {
  it('renders records in insertion order and closes with its own path', () => {
    const records = new RecordBuilder();
    records.add({ archivePath: 'b.py', contentHashBase64Url: 'BBB', sizeBytes: 2 });
    records.add({ archivePath: 'a.py', contentHashBase64Url: 'AAA', sizeBytes: 10 });
    const text = new TextDecoder().decode(records.render('demo-1.0.dist-info/RECORD'));
    expect(text).toBe('b.py,sha256=BBB,2\na.py,sha256=AAA,10\ndemo-1.0.dist-info/RECORD,,\n');
  });
});

describe('ArchiveWriter', () => {
  let dir: string;
  let records: RecordBuilder;

  beforeEach(async () => {
    dir = await makeTempDir();
    records = new RecordBuilder();
    await writeTree(dir, {
      'src/plain.txt': { content: 'hello\n', mode: 0o666 },
      'src/tool.sh': { content: '#!/bin/sh\necho hi\n', mode: 0o4777 },
      'src/big.bin': 'x'.repeat(20_000),
    });
  });

  const file = (name: string, archivePath: string) => ({
    sourceLocation: path.join(dir, 'src', name),
    archivePath,
    isGenerated: false,
  });

  it('writes entries with hashes, sizes and normalized attributes', async () => {
    const writer = await ArchiveWriter.open(path.join(dir, 'out.tmp'), records);
    const plain = await writer.writeFile(file('plain.txt', 'pkg/plain.txt'));
    await writer.writeFile(file('tool.sh', 'pkg/tool.sh'));
    const big = await writer.writeFile(file('big.bin', 'pkg/big.bin'));
    const gen = await writer.writeGenerated('pkg-1.0.dist-info/WHEEL', new TextEncoder().encode('Tag: x\n'));
    await writer.commit(path.join(dir, 'out.whl'));

    expect(plain).toEqual({ archivePath: 'pkg/plain.txt', contentHashBase64Url: sha256('hello\n'), sizeBytes: 6 });
    expect(big.sizeBytes).toBe(20_000);
    expect(big.contentHashBase64Url).toBe(sha256('x'.repeat(20_000)));
    expect(gen).toEqual({ archivePath: 'pkg-1.0.dist-info/WHEEL', contentHashBase64Url: sha256('Tag: x\n'), sizeBytes: 7 });
    expect(records.records().map((r) => r.archivePath)).toEqual([
      'pkg/plain.txt',
      'pkg/tool.sh',
      'pkg/big.bin',
      'pkg-1.0.dist-info/WHEEL',
    ]);

    const bytes = await fs.readFile(path.join(dir, 'out.whl'));
    const contents = unzipSync(bytes);
    expect(new TextDecoder().decode(contents['pkg/plain.txt'])).toBe('hello\n');
    expect(contents['pkg/big.bin'].length).toBe(20_000);

    const central = readCentralDirectory(bytes);
    expect(central.map((e) => e.name)).toEqual(['pkg/plain.txt', 'pkg/tool.sh', 'pkg/big.bin', 'pkg-1.0.dist-info/WHEEL']);
    expect(central.map(unixMode)).toEqual([0o100644, 0o100755, 0o100644, 0o100644]);
    expect(central.every((e) => e.versionMadeBy >> 8 === 3)).toBe(true);
    // 1980-01-01 00:00 for files, 2016-01-01 00:00 for generated entries
    expect(central.slice(0, 3).map((e) => [e.dosDate, e.dosTime])).toEqual([
      [33, 0],
      [33, 0],
      [33, 0],
    ]);
    expect([central[3].dosDate, central[3].dosTime]).toEqual([18465, 0]);
    expect(await pathExists(path.join(dir, 'out.tmp'))).toBe(false);
  });

  it('writes the manifest without recording it', async () => {
    const writer = await ArchiveWriter.open(path.join(dir, 'out.tmp'), records);
    await writer.writeGenerated('pkg-1.0.dist-info/WHEEL', new TextEncoder().encode('Tag: x\n'));
    await writer.writeManifest('pkg-1.0.dist-info/RECORD');
    await writer.commit(path.join(dir, 'out.whl'));

    expect(records.records().map((r) => r.archivePath)).toEqual(['pkg-1.0.dist-info/WHEEL']);
    const contents = unzipSync(await fs.readFile(path.join(dir, 'out.whl')));
    expect(new TextDecoder().decode(contents['pkg-1.0.dist-info/RECORD'])).toBe(
      `pkg-1.0.dist-info/WHEEL,sha256=${sha256('Tag: x\n')},7\npkg-1.0.dist-info/RECORD,,\n`,
    );
  });

  it('creates the archive as 0644', async () => {
    const writer = await ArchiveWriter.open(path.join(dir, 'out.tmp'), records);
    await writer.commit(path.join(dir, 'out.whl'));
    const stat = await fs.stat(path.join(dir, 'out.whl'));
    expect(stat.mode & 0o777).toBe(0o644);
  });

  it('refuses a second entry with the same path', async () => {
    const writer = await ArchiveWriter.open(path.join(dir, 'out.tmp'), records);
    await writer.writeFile(file('plain.txt', 'pkg/plain.txt'));
    await expect(writer.writeGenerated('pkg/plain.txt', new Uint8Array([1]))).rejects.toMatchObject({
      kind: 'DuplicateArchivePath',
    });
    await writer.discard();
  });

  it('reports unreadable sources and discards the temporary file', async () => {
    const tempPath = path.join(dir, 'out.tmp');
    const writer = await ArchiveWriter.open(tempPath, records);
    await expect(writer.writeFile(file('missing.py', 'pkg/missing.py'))).rejects.toMatchObject({
      kind: 'SourceReadFailure',
      code: -32011,
    });
    expect(records.records()).toEqual([]);
    await writer.discard();
    expect(await pathExists(tempPath)).toBe(false);
  });
});
