import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createExcluder, isBuildArtifact, type FileEntry } from './collect.js';
import { WheelBuildError, describeError } from './errors.js';
import { compareStrings, emitProgress, ensureDir, pathExists, run, walk, type RunResult } from './utils.js';

export type NativeBuildOptions = {
  projectRoot: string;
  /** Build script declared by the project, relative to the root. */
  script: string;
  python: string;
  /** Output directory for this invocation; the tool writes `lib.<platform>` inside it. */
  buildDir: string;
  /** Archive paths already taken by collected files. */
  existing: ReadonlySet<string>;
  exclude: string[];
  timeoutMs?: number;
  jobId?: string;
};

/** First `lib.*` directory the build tool produced, or null when it produced none. */
export async function findLibDir(buildDir: string): Promise<string | null> {
  if (!(await pathExists(buildDir))) return null;
  const dirs = (await fs.readdir(buildDir, { withFileTypes: true }))
    .filter((d) => d.isDirectory() && d.name.startsWith('lib.'))
    .map((d) => d.name)
    .sort(compareStrings);
  return dirs.length ? path.join(buildDir, dirs[0]) : null;
}

/**
 * Run `<python> <script> build -b <buildDir>` in the project root and return the extension
 * files it produced that are not already collected.
 */
export async function invokeNativeBuild(opts: NativeBuildOptions): Promise<FileEntry[]> {
  const { projectRoot, script, python, buildDir, jobId } = opts;
  await ensureDir(buildDir);

  const args = [script, 'build', '-b', buildDir];
  emitProgress({ tool: 'build', phase: 'native', detail: `${python} ${args.join(' ')}`, extra: { jobId } });
  let res: RunResult;
  try {
    res = await run(python, args, projectRoot, { timeoutMs: opts.timeoutMs });
  } catch (err: unknown) {
    throw new WheelBuildError('BuildCommandFailed', `cannot start build command: ${describeError(err)}`, {
      command: [python, ...args],
    });
  }
  if (res.timedOut) {
    throw new WheelBuildError('BuildCommandFailed', `build command timed out after ${opts.timeoutMs}ms`, {
      command: [python, ...args],
      timedOut: true,
      timeoutMs: opts.timeoutMs,
    });
  }
  if (res.code !== 0) {
    throw new WheelBuildError('BuildCommandFailed', `build command exited with status ${res.code}`, {
      command: [python, ...args],
      exitCode: res.code,
      stdout: res.stdout,
      stderr: res.stderr,
    });
  }

  const lib = await findLibDir(buildDir);
  if (lib === null) {
    // conditional builds may legitimately produce nothing
    emitProgress({ tool: 'build', phase: 'native', detail: 'no extension output', extra: { jobId } });
    return [];
  }

  const isExcluded = createExcluder(opts.exclude);
  const out: FileEntry[] = [];
  try {
    for await (const entry of walk(lib)) {
      if (entry.isDir || isBuildArtifact(entry.rel) || isExcluded(entry.rel)) continue;
      if (opts.existing.has(entry.rel)) continue;
      out.push({ sourceLocation: entry.full, archivePath: entry.rel, isGenerated: true });
    }
  } catch (err: unknown) {
    throw new WheelBuildError('SourceReadFailure', `cannot read build output ${lib}: ${describeError(err)}`, {
      path: lib,
    });
  }
  return out.sort((a, b) => compareStrings(a.archivePath, b.archivePath));
}
