import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import path from 'node:path';

type RunOptions = { timeoutMs?: number };

export type RunResult = { code: number; stdout: string; stderr: string; timedOut: boolean };

export function run(cmd: string, args: string[], cwd: string, opts: RunOptions = {}): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, { cwd, env: process.env });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    if (opts.timeoutMs && opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, opts.timeoutMs).unref();
    }

    child.stdout.on('data', (d: Buffer) => (stdout += d.toString()));
    child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));
    child.on('error', (err) => {
      if (timer) clearTimeout(timer);
      reject(err);
    });
    child.on('close', (code) => {
      if (timer) clearTimeout(timer);
      // killed by a signal: report as failure
      resolve({ code: code ?? 1, stdout, stderr, timedOut });
    });
  });
}

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true });
}

export async function pathExists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export type WalkEntry = { full: string; rel: string; isDir: boolean };

type WalkOptions = {
  /** Return false to skip a directory's children. The directory itself is still yielded. */
  descend?: (entry: WalkEntry) => boolean;
};

/**
 * Depth-first walk yielding files and directories, children in name order. Symlinks are
 * followed; a link back to a directory already on the current path is not descended twice.
 */
export async function* walk(root: string, opts: WalkOptions = {}): AsyncGenerator<WalkEntry> {
  yield* walkDir(root, root, opts, new Set([await fs.realpath(root)]));
}

async function* walkDir(
  root: string,
  dir: string,
  opts: WalkOptions,
  ancestors: ReadonlySet<string>,
): AsyncGenerator<WalkEntry> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => compareStrings(a.name, b.name));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    const rel = toPosix(path.relative(root, full));
    let isDir = entry.isDirectory();
    let isFile = entry.isFile();
    if (entry.isSymbolicLink()) {
      const target = await fs.stat(full);
      isDir = target.isDirectory();
      isFile = target.isFile();
    }
    if (isDir) {
      const real = await fs.realpath(full);
      if (ancestors.has(real)) continue;
      const item = { full, rel, isDir: true };
      yield item;
      if (!opts.descend || opts.descend(item)) yield* walkDir(root, full, opts, new Set([...ancestors, real]));
    } else if (isFile) {
      yield { full, rel, isDir: false };
    }
  }
}

export function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export type RpcError = Error & { code: number; data?: unknown };

export function rpcError(code: number, message: string, data?: unknown): RpcError {
  const err: RpcError = Object.assign(new Error(message), { code });
  if (data !== undefined) err.data = data;
  return err;
}

type ProgressParams = {
  tool: string;
  phase: string;
  detail?: string;
  current?: number;
  total?: number;
  extra?: Record<string, unknown>;
};

export function emitProgress(params: ProgressParams) {
  const { tool, phase, detail, current, total, extra } = params;
  const payload: Record<string, unknown> = { tool, phase };
  if (detail) payload.detail = detail;
  if (typeof current === 'number') payload.current = current;
  if (typeof total === 'number') payload.total = total;
  if (extra && Object.keys(extra).length) Object.assign(payload, extra);
  console.log(JSON.stringify({ jsonrpc: '2.0', method: 'progress', params: payload }));
}
