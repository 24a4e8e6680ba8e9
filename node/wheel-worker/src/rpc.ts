import path from 'node:path';
import { z } from 'zod';
import { collectFiles } from './collect.js';
import { tagString } from './naming.js';
import { loadProject, requiresNativeBuild } from './project.js';
import { pythonTagProbe, resolveTag } from './tags.js';
import { rpcError } from './utils.js';
import { VERSION } from './version.js';
import { DEFAULT_PYTHON, buildWheel } from './wheel.js';

const ProjectParamsSchema = z.object({
  projectRoot: z.string().min(1),
  project: z.unknown().optional(),
  python: z.string().min(1).optional(),
});

const BuildParamsSchema = ProjectParamsSchema.extend({
  destDir: z.string().min(1).optional(),
  buildTimeoutMs: z.number().int().positive().optional(),
  generator: z.string().min(1).optional(),
});

function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'params'} ${i.message}`).join('; ');
    throw rpcError(-32602, `invalid params: ${detail}`);
  }
  return parsed.data;
}

export type RpcErrorBody = { code: number; message: string; data?: unknown };

/** Error payload for a response: coded errors keep their code and data. */
export function toErrorBody(e: unknown): RpcErrorBody {
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'number' ? e.code : -32603;
    const data = 'data' in e ? e.data : undefined;
    return data === undefined ? { code, message: e.message } : { code, message: e.message, data };
  }
  return { code: -32603, message: String(e) };
}

export async function handleAsync(method: string, params: unknown): Promise<unknown> {
  switch (method) {
    case 'ping':
      return { ok: true, msg: `wheel-worker ${VERSION} ready` };
    case 'build': {
      const p = parseParams(BuildParamsSchema, params);
      const project = await loadProject(p.projectRoot, p.project);
      return await buildWheel({
        projectRoot: p.projectRoot,
        project,
        destDir: p.destDir,
        python: p.python,
        buildTimeoutMs: p.buildTimeoutMs,
        generator: p.generator,
      });
    }
    case 'tag': {
      const p = parseParams(ProjectParamsSchema, params);
      const project = await loadProject(p.projectRoot, p.project);
      const probe = pythonTagProbe(p.python ?? DEFAULT_PYTHON, path.resolve(p.projectRoot));
      const tag = await resolveTag(requiresNativeBuild(project), project.python, probe);
      return { tag: tagString(tag) };
    }
    case 'collect': {
      const p = parseParams(ProjectParamsSchema, params);
      const project = await loadProject(p.projectRoot, p.project);
      const files = await collectFiles(p.projectRoot, project);
      return { files: files.map((f) => ({ source: f.sourceLocation, archivePath: f.archivePath })) };
    }
    default:
      throw rpcError(-32601, 'method not found');
  }
}
