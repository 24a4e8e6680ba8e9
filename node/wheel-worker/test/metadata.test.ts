import { promises as fs } from 'node:fs';
import path from 'node:path';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  convertEntryPoints,
  findLicenseFiles,
  renderEntryPoints,
  renderMetadata,
  renderWheelFile,
} from '../src/metadata.js';
import { parseProject } from '../src/project.js';
import { makeTempDir, writeTree } from './helpers.js';

const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe('entry points', () => {
  it('sorts groups and entries and strips spaces', () => {
    const text = renderEntryPoints({
      console_scripts: ['foo = pkg:main'],
      b_group: ['x = y:z'],
    });
    expect(text).toBe('[b_group]\nx=y:z\n\n[console_scripts]\nfoo=pkg:main\n\n');
  });

  it('turns scripts and plugins into groups', () => {
    const project = parseProject({
      name: 'demo',
      version: '1.0.0',
      scripts: {
        tool: { callable: 'demo.tool:run', extras: ['fast'] },
        cli: 'demo.cli:main',
      },
      plugins: { 'demo.plugins': { a: 'demo.a:A' } },
    });
    const groups = convertEntryPoints(project);
    expect(groups).toEqual({
      console_scripts: ['tool = demo.tool:run [fast]', 'cli = demo.cli:main'],
      'demo.plugins': ['a = demo.a:A'],
    });
    expect(renderEntryPoints(groups)).toBe(
      '[console_scripts]\ncli=demo.cli:main\ntool=demo.tool:run[fast]\n\n[demo.plugins]\na=demo.a:A\n\n',
    );
  });
});

describe('renderWheelFile', () => {
  it('declares format, generator, purity and tag', () => {
    const text = renderWheelFile('wheel-worker 9.9.9', true, { interpreter: 'py3', abi: 'none', platform: 'any' });
    expect(text).toBe('Wheel-Version: 1.0\nGenerator: wheel-worker 9.9.9\nRoot-Is-Purelib: true\nTag: py3-none-any\n');
  });

  it('marks native wheels as platlib', () => {
    const text = renderWheelFile('gen', false, { interpreter: 'cp311', abi: 'cp311', platform: 'linux_x86_64' });
    expect(text).toContain('Root-Is-Purelib: false\nTag: cp311-cp311-linux_x86_64\n');
  });
});

describe('findLicenseFiles', () => {
  it('matches the canonical prefixes case-sensitively', async () => {
    const root = await makeTempDir();
    await writeTree(root, {
      'LICENSE.txt': 'MIT',
      LICENSE: 'MIT',
      COPYING: 'GPL',
      'license.md': 'lower case',
      'LICENSES/extra.txt': 'in a directory',
    });
    expect(await findLicenseFiles(root)).toEqual(['COPYING', 'LICENSE', 'LICENSE.txt']);
  });

  it('counts symlinked license files by their target', async () => {
    const root = await makeTempDir();
    await writeTree(root, { 'legal/MIT.txt': 'MIT' });
    await fs.symlink('legal/MIT.txt', path.join(root, 'LICENSE'));
    await fs.symlink('legal', path.join(root, 'LICENSES'));
    expect(await findLicenseFiles(root)).toEqual(['LICENSE']);
  });

  it('reports a project root it cannot list', async () => {
    const missing = path.join(await makeTempDir(), 'missing');
    await expect(findLicenseFiles(missing)).rejects.toMatchObject({ kind: 'SourceReadFailure', code: -32011 });
  });
});

describe('renderMetadata', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  const base = {
    name: 'demo',
    version: '1.0.0',
    description: 'A demo',
    python: '>=3.8',
    dependencies: ['requests>=2'],
  };

  it('renders a minimal core metadata document', async () => {
    const bytes = await renderMetadata(parseProject(base), root);
    expect(decode(bytes)).toBe(
      'Metadata-Version: 2.1\nName: demo\nVersion: 1.0.0\nSummary: A demo\nRequires-Python: >=3.8\nRequires-Dist: requests>=2\n',
    );
  });

  it('appends the readme as the description body', async () => {
    await writeTree(root, { 'README.md': '# Demo\n' });
    const bytes = await renderMetadata(parseProject({ ...base, readme: 'README.md' }), root);
    expect(decode(bytes)).toBe(
      'Metadata-Version: 2.1\nName: demo\nVersion: 1.0.0\nSummary: A demo\nRequires-Python: >=3.8\n' +
        'Requires-Dist: requests>=2\nDescription-Content-Type: text/markdown\n\n# Demo\n',
    );
  });

  it('passes pre-rendered metadata through untouched', async () => {
    await writeTree(root, { 'PKG-INFO': 'Metadata-Version: 2.3\nName: demo\n' });
    const fromText = await renderMetadata(parseProject({ ...base, metadata: { text: 'opaque blob' } }), root);
    expect(decode(fromText)).toBe('opaque blob');
    const fromFile = await renderMetadata(parseProject({ ...base, metadata: { file: 'PKG-INFO' } }), root);
    expect(decode(fromFile)).toBe(await fs.readFile(`${root}/PKG-INFO`, 'utf-8'));
  });

  it('fails when the readme is missing', async () => {
    await expect(renderMetadata(parseProject({ ...base, readme: 'NOPE.md' }), root)).rejects.toMatchObject({
      kind: 'SourceReadFailure',
    });
  });
});
