import path from 'node:path';
import { Minimatch } from 'minimatch';
import { WheelBuildError, describeError } from './errors.js';
import { moduleName } from './naming.js';
import { appliesToWheel, type PackageRule, type Project } from './project.js';
import { compareStrings, pathExists, toPosix, walk, type WalkEntry } from './utils.js';

export type FileEntry = {
  sourceLocation: string;
  archivePath: string;
  isGenerated: boolean;
};

/** A rule resolved against the filesystem: archive paths are relative to `base`. */
export type ResolvedRule = {
  base: string;
  pattern: string;
  isPackage: boolean;
};

const CACHE_MARKER = '__pycache__';
const BYTECODE_SUFFIX = '.pyc';

export function isBuildArtifact(rel: string): boolean {
  return rel.includes(CACHE_MARKER) || rel.endsWith(BYTECODE_SUFFIX);
}

function buildMatchers(patterns: string[]): Minimatch[] {
  return patterns.map((p) => new Minimatch(p, { dot: true, nocase: false, nocomment: true }));
}

/**
 * Matcher for the project's `exclude` globs, tested against root-relative paths. A path is
 * excluded when it or any of its parent directories matches.
 */
export function createExcluder(patterns: string[]): (rel: string) => boolean {
  const matchers = buildMatchers(patterns);
  return (rel) => {
    const parts = rel.split('/');
    for (let i = parts.length; i > 0; i--) {
      const candidate = parts.slice(0, i).join('/');
      if (matchers.some((m) => m.match(candidate))) return true;
    }
    return false;
  };
}

async function defaultPackageRules(projectRoot: string, project: Project): Promise<PackageRule[]> {
  const mod = moduleName(project.name);
  for (const from of [undefined, 'src']) {
    const base = from ? path.join(projectRoot, from) : projectRoot;
    if (await pathExists(path.join(base, mod))) return [{ include: mod, from }];
    if (await pathExists(path.join(base, `${mod}.py`))) return [{ include: `${mod}.py`, from }];
  }
  return [];
}

export async function resolveRules(projectRoot: string, project: Project): Promise<ResolvedRule[]> {
  const root = path.resolve(projectRoot);
  const packages = project.packages ?? (await defaultPackageRules(root, project));
  const rules: ResolvedRule[] = [];
  for (const pkg of packages) {
    if (!appliesToWheel(pkg.format)) continue;
    const base = pkg.from ? path.resolve(root, pkg.from) : root;
    rules.push({ base, pattern: pkg.include, isPackage: true });
  }
  for (const inc of project.include) {
    const rule = typeof inc === 'string' ? { path: inc, format: undefined } : inc;
    if (!appliesToWheel(rule.format)) continue;
    rules.push({ base: root, pattern: rule.path, isPackage: false });
  }
  return rules;
}

/**
 * Files a rule selects. Package rules take whole directories; plain file rules only take
 * files the glob names directly.
 */
export async function matchRule(rule: ResolvedRule): Promise<WalkEntry[]> {
  if (!(await pathExists(rule.base))) return [];
  const mm = new Minimatch(rule.pattern, { dot: true, nocase: false, nocomment: true });
  const matchedDirs: string[] = [];
  const within = (rel: string) => matchedDirs.some((d) => rel.startsWith(`${d}/`));

  const out: WalkEntry[] = [];
  const entries = walk(rule.base, {
    descend: (dir) => mm.match(dir.rel, true) || (rule.isPackage && (within(dir.rel) || matchedDirs.includes(dir.rel))),
  });
  try {
    for await (const entry of entries) {
      if (entry.isDir) {
        if (rule.isPackage && mm.match(entry.rel)) matchedDirs.push(entry.rel);
        continue;
      }
      if (mm.match(entry.rel) || (rule.isPackage && within(entry.rel))) out.push(entry);
    }
  } catch (err: unknown) {
    throw new WheelBuildError('SourceReadFailure', `cannot read ${rule.base}: ${describeError(err)}`, {
      base: rule.base,
      pattern: rule.pattern,
    });
  }
  return out;
}

/**
 * Collect the project files that go into the wheel, sorted by archive path.
 * The same source reached twice under the same archive path is kept once; two different
 * sources under one archive path are a {@link WheelBuildError} `DuplicateArchivePath`.
 */
export async function collectFiles(projectRoot: string, project: Project): Promise<FileEntry[]> {
  const root = path.resolve(projectRoot);
  const isExcluded = createExcluder(project.exclude);
  const seen = new Map<string, string>();
  const entries: FileEntry[] = [];

  for (const rule of await resolveRules(root, project)) {
    for (const file of await matchRule(rule)) {
      const fromRoot = toPosix(path.relative(root, file.full));
      if (isBuildArtifact(fromRoot)) continue;
      if (rule.isPackage && isExcluded(fromRoot)) continue;

      const archivePath = file.rel;
      const previous = seen.get(archivePath);
      if (previous === file.full) continue;
      if (previous !== undefined) {
        throw new WheelBuildError(
          'DuplicateArchivePath',
          `${archivePath} would be written from both ${previous} and ${file.full}`,
          { archivePath, sources: [previous, file.full] },
        );
      }
      seen.set(archivePath, file.full);
      entries.push({ sourceLocation: file.full, archivePath, isGenerated: false });
    }
  }

  return entries.sort((a, b) => compareStrings(a.archivePath, b.archivePath));
}
