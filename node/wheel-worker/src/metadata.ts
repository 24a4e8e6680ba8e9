import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { ArchiveWriter } from './archive.js';
import { WheelBuildError, describeError } from './errors.js';
import { tagString } from './naming.js';
import type { Project } from './project.js';
import type { Tag } from './tags.js';
import { compareStrings } from './utils.js';

export const WHEEL_FORMAT_VERSION = '1.0';
export const LICENSE_PREFIXES = ['COPYING', 'LICENSE'];

export type EntryPointGroups = Record<string, string[]>;

export type MetadataContext = {
  projectRoot: string;
  project: Project;
  distInfo: string;
  tag: Tag;
  pureLib: boolean;
  generator: string;
  metadata: Uint8Array;
};

const encoder = new TextEncoder();

/** `scripts` become `console_scripts`; each plugin table is its own group. */
export function convertEntryPoints(project: Project): EntryPointGroups {
  const groups: EntryPointGroups = {};
  if (project.scripts) {
    groups.console_scripts = Object.entries(project.scripts).map(([name, script]) => {
      if (typeof script === 'string') return `${name} = ${script}`;
      const extras = script.extras?.length ? ` [${script.extras.join(',')}]` : '';
      return `${name} = ${script.callable}${extras}`;
    });
  }
  for (const [group, entries] of Object.entries(project.plugins ?? {})) {
    const lines = Object.entries(entries).map(([name, target]) => `${name} = ${target}`);
    groups[group] = [...(groups[group] ?? []), ...lines];
  }
  return groups;
}

export function renderEntryPoints(groups: EntryPointGroups): string {
  let out = '';
  for (const group of Object.keys(groups).sort(compareStrings)) {
    out += `[${group}]\n`;
    for (const entry of [...groups[group]].sort(compareStrings)) {
      out += `${entry.replace(/ /g, '')}\n`;
    }
    out += '\n';
  }
  return out;
}

export function renderWheelFile(generator: string, pureLib: boolean, tag: Tag): string {
  return (
    `Wheel-Version: ${WHEEL_FORMAT_VERSION}\n` +
    `Generator: ${generator}\n` +
    `Root-Is-Purelib: ${pureLib ? 'true' : 'false'}\n` +
    `Tag: ${tagString(tag)}\n`
  );
}

/** Root files named `COPYING*` or `LICENSE*`, exact case, sorted by name. Symlinks count by their target. */
export async function findLicenseFiles(projectRoot: string): Promise<string[]> {
  try {
    const names: string[] = [];
    for (const e of await fs.readdir(projectRoot, { withFileTypes: true })) {
      if (!LICENSE_PREFIXES.some((p) => e.name.startsWith(p))) continue;
      const isFile = e.isSymbolicLink() ? (await fs.stat(path.join(projectRoot, e.name))).isFile() : e.isFile();
      if (isFile) names.push(e.name);
    }
    return names.sort(compareStrings);
  } catch (err: unknown) {
    throw new WheelBuildError('SourceReadFailure', `cannot list license files in ${projectRoot}: ${describeError(err)}`, {
      path: projectRoot,
    });
  }
}

async function readSource(file: string): Promise<Buffer> {
  try {
    return await fs.readFile(file);
  } catch (err: unknown) {
    throw new WheelBuildError('SourceReadFailure', `cannot read ${file}: ${describeError(err)}`, { source: file });
  }
}

function descriptionContentType(readme: string): string {
  switch (path.extname(readme).toLowerCase()) {
    case '.md':
      return 'text/markdown';
    case '.rst':
      return 'text/x-rst';
    default:
      return 'text/plain';
  }
}

/**
 * METADATA bytes: the caller's pre-rendered text or file when given, otherwise a minimal
 * core-metadata document.
 */
export async function renderMetadata(project: Project, projectRoot: string): Promise<Uint8Array> {
  if (project.metadata?.text !== undefined) return encoder.encode(project.metadata.text);
  if (project.metadata?.file) return readSource(path.join(projectRoot, project.metadata.file));

  const lines = ['Metadata-Version: 2.1', `Name: ${project.name}`, `Version: ${project.version}`];
  if (project.description) lines.push(`Summary: ${project.description}`);
  if (project.python.trim() !== '*') lines.push(`Requires-Python: ${project.python}`);
  for (const dep of project.dependencies) lines.push(`Requires-Dist: ${dep}`);
  let body = '';
  if (project.readme) {
    const readme = await readSource(path.join(projectRoot, project.readme));
    lines.push(`Description-Content-Type: ${descriptionContentType(project.readme)}`);
    body = `\n${readme.toString('utf-8')}`;
  }
  return encoder.encode(`${lines.join('\n')}\n${body}`);
}

/** Write the dist-info control files, in the order they appear in the archive. */
export async function writeMetadata(writer: ArchiveWriter, ctx: MetadataContext): Promise<void> {
  const dir = ctx.distInfo;
  if (ctx.project.scripts || ctx.project.plugins) {
    const text = renderEntryPoints(convertEntryPoints(ctx.project));
    await writer.writeGenerated(`${dir}/entry_points.txt`, encoder.encode(text));
  }

  for (const name of await findLicenseFiles(ctx.projectRoot)) {
    await writer.writeFile({
      sourceLocation: path.join(ctx.projectRoot, name),
      archivePath: `${dir}/${name}`,
      isGenerated: false,
    });
  }

  await writer.writeGenerated(`${dir}/WHEEL`, encoder.encode(renderWheelFile(ctx.generator, ctx.pureLib, ctx.tag)));
  await writer.writeGenerated(`${dir}/METADATA`, ctx.metadata);
}
