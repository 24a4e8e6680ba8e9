import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { rpcError } from './utils.js';

export const PROJECT_FILE = 'wheel-project.json';

const FormatSchema = z.union([z.string(), z.array(z.string())]).optional();

export const PackageRuleSchema = z.object({
  include: z.string().min(1),
  from: z.string().optional(),
  format: FormatSchema,
});

export const FileRuleSchema = z.union([
  z.string().min(1),
  z.object({ path: z.string().min(1), format: FormatSchema }),
]);

export const ScriptSchema = z.union([
  z.string().min(1),
  z.object({ callable: z.string().min(1), extras: z.array(z.string()).optional() }),
]);

export const ProjectSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  python: z.string().default('*'),
  packages: z.array(PackageRuleSchema).optional(),
  include: z.array(FileRuleSchema).default([]),
  exclude: z.array(z.string()).default([]),
  build: z.string().optional(),
  scripts: z.record(ScriptSchema).optional(),
  plugins: z.record(z.record(z.string())).optional(),
  dependencies: z.array(z.string()).default([]),
  readme: z.string().optional(),
  metadata: z.object({ text: z.string().optional(), file: z.string().optional() }).optional(),
});

export type PackageRule = z.infer<typeof PackageRuleSchema>;
export type FileRule = z.infer<typeof FileRuleSchema>;
export type Script = z.infer<typeof ScriptSchema>;
export type Project = z.infer<typeof ProjectSchema>;

export function parseProject(value: unknown): Project {
  const parsed = ProjectSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw rpcError(-32602, `invalid project descriptor: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}

/** Uses the descriptor passed in, or reads `wheel-project.json` from the project root. */
export async function loadProject(projectRoot: string, explicit?: unknown): Promise<Project> {
  if (explicit !== undefined && explicit !== null) return parseProject(explicit);
  const file = path.join(projectRoot, PROJECT_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf-8');
  } catch {
    throw rpcError(-32602, `project descriptor missing: ${file}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    const msg = e instanceof Error ? e.message : String(e);
    throw rpcError(-32602, `project descriptor is not valid JSON: ${msg}`);
  }
  return parseProject(json);
}

export function requiresNativeBuild(project: Project): boolean {
  return project.build !== undefined;
}

/** Whether a rule scoped by `format` applies to wheels. Unscoped rules always do. */
export function appliesToWheel(format: string | string[] | undefined): boolean {
  if (format === undefined) return true;
  const formats = typeof format === 'string' ? [format] : format;
  return formats.length === 0 || formats.includes('wheel');
}
