import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ulid } from 'ulid';
import { ArchiveWriter } from './archive.js';
import { collectFiles, type FileEntry } from './collect.js';
import { describeError } from './errors.js';
import { renderMetadata, writeMetadata } from './metadata.js';
import { invokeNativeBuild } from './native-build.js';
import { distInfoName, tagString, wheelFileName } from './naming.js';
import { requiresNativeBuild, type Project } from './project.js';
import { RecordBuilder, type ManifestRecord } from './record.js';
import { pythonTagProbe, resolveTag, type HostTagProbe } from './tags.js';
import { emitProgress, ensureDir } from './utils.js';
import { DEFAULT_GENERATOR } from './version.js';

export const DEFAULT_PYTHON = 'python3';

export type MetadataRenderer = (project: Project, projectRoot: string) => Promise<Uint8Array>;

export type BuildOptions = {
  projectRoot: string;
  project: Project;
  /** Defaults to `<projectRoot>/dist`. */
  destDir?: string;
  python?: string;
  buildTimeoutMs?: number;
  generator?: string;
  probe?: HostTagProbe;
  renderMetadata?: MetadataRenderer;
};

export type BuildState = 'init' | 'collecting' | 'building' | 'writing' | 'finalizing' | 'done' | 'failed';

export type BuildResult = {
  jobId: string;
  wheelName: string;
  wheelPath: string;
  tag: string;
  distInfo: string;
  records: ManifestRecord[];
};

const PROGRESS_EVERY = 25;

/**
 * Build one wheel. The archive is written to a temporary file beside the destination and
 * renamed over `<destDir>/<wheelName>` only once complete; on failure the temporary file is
 * removed and whatever was at the destination stays as it was.
 */
export async function buildWheel(opts: BuildOptions): Promise<BuildResult> {
  const jobId = ulid();
  const root = path.resolve(opts.projectRoot);
  const { project } = opts;
  const python = opts.python ?? DEFAULT_PYTHON;

  let state: BuildState = 'init';
  const enter = (next: BuildState, extra: Record<string, unknown> = {}) => {
    state = next;
    emitProgress({ tool: 'build', phase: next, extra: { jobId, ...extra } });
  };
  emitProgress({ tool: 'build', phase: 'start', extra: { jobId, name: project.name, version: project.version } });

  let writer: ArchiveWriter | null = null;
  let buildDir: string | null = null;
  try {
    const native = requiresNativeBuild(project);
    const tag = await resolveTag(native, project.python, opts.probe ?? pythonTagProbe(python, root));
    const distInfo = distInfoName(project.name, project.version);
    const wheelName = wheelFileName(project.name, project.version, tag);

    enter('collecting');
    const files = await collectFiles(root, project);

    let nativeFiles: FileEntry[] = [];
    if (project.build !== undefined) {
      enter('building');
      buildDir = path.join(root, 'build', jobId);
      nativeFiles = await invokeNativeBuild({
        projectRoot: root,
        script: project.build,
        python,
        buildDir,
        existing: new Set(files.map((f) => f.archivePath)),
        exclude: project.exclude,
        timeoutMs: opts.buildTimeoutMs,
        jobId,
      });
    }

    const entries = [...files, ...nativeFiles];
    enter('writing', { files: entries.length });
    const destDir = path.resolve(opts.destDir ?? path.join(root, 'dist'));
    await ensureDir(destDir);
    const records = new RecordBuilder();
    writer = await ArchiveWriter.open(path.join(destDir, `.${jobId}.whl.tmp`), records);

    for (const [i, entry] of entries.entries()) {
      await writer.writeFile(entry);
      if ((i + 1) % PROGRESS_EVERY === 0) {
        emitProgress({
          tool: 'build',
          phase: 'add',
          current: i + 1,
          total: entries.length,
          detail: entry.archivePath,
          extra: { jobId },
        });
      }
    }

    const metadata = await (opts.renderMetadata ?? renderMetadata)(project, root);
    await writeMetadata(writer, {
      projectRoot: root,
      project,
      distInfo,
      tag,
      pureLib: !native,
      generator: opts.generator ?? DEFAULT_GENERATOR,
      metadata,
    });

    enter('finalizing');
    const recordPath = `${distInfo}/RECORD`;
    await writer.writeManifest(recordPath);
    const wheelPath = path.join(destDir, wheelName);
    await writer.commit(wheelPath);
    writer = null;

    enter('done', { wheelPath });
    return { jobId, wheelName, wheelPath, tag: tagString(tag), distInfo, records: [...records.records()] };
  } catch (err: unknown) {
    const failedIn = state;
    state = 'failed';
    if (writer) {
      try {
        await writer.discard();
      } catch (cleanupErr: unknown) {
        emitProgress({ tool: 'build', phase: 'warning', detail: describeError(cleanupErr), extra: { jobId } });
      }
    }
    emitProgress({ tool: 'build', phase: state, detail: describeError(err), extra: { jobId, failedIn } });
    throw err;
  } finally {
    // native outputs are read until the archive is committed
    if (buildDir !== null) {
      try {
        await fs.rm(buildDir, { recursive: true, force: true });
      } catch (cleanupErr: unknown) {
        emitProgress({ tool: 'build', phase: 'warning', detail: describeError(cleanupErr), extra: { jobId } });
      }
    }
  }
}
