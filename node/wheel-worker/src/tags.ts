import { z } from 'zod';
import { WheelBuildError, describeError } from './errors.js';
import { run, type RunResult } from './utils.js';
import { PYTHON2_RANGE, allowsAny } from './version-range.js';

export const TagSchema = z.object({
  interpreter: z.string().min(1),
  abi: z.string().min(1),
  platform: z.string().min(1),
});

export type Tag = z.infer<typeof TagSchema>;

/** Reports the most specific tag the host interpreter can install. */
export interface HostTagProbe {
  probe(): Promise<Tag>;
}

const PROBE_SCRIPT = `
import json, sys, sysconfig
try:
    from packaging.tags import sys_tags
    t = next(iter(sys_tags()))
    tag = {"interpreter": t.interpreter, "abi": t.abi, "platform": t.platform}
except ImportError:
    name = sys.implementation.name
    impl = {"cpython": "cp", "pypy": "pp"}.get(name, name)
    ver = "%d%d" % sys.version_info[:2]
    soabi = sysconfig.get_config_var("SOABI") or ""
    parts = soabi.split("-")
    abi = impl + ver if name == "cpython" else (parts[0].replace(".", "_") if soabi else "none")
    plat = sysconfig.get_platform().replace("-", "_").replace(".", "_")
    tag = {"interpreter": impl + ver, "abi": abi, "platform": plat}
print(json.dumps(tag))
`;

/** Asks a Python interpreter for its first supported tag. */
export function pythonTagProbe(python: string, cwd: string): HostTagProbe {
  return {
    async probe() {
      let res: RunResult;
      try {
        res = await run(python, ['-c', PROBE_SCRIPT], cwd, { timeoutMs: 30_000 });
      } catch (err: unknown) {
        throw new WheelBuildError(
          'ConfigurationIncompatible',
          `cannot run "${python}" to determine the platform tag: ${describeError(err)}`,
          { python },
        );
      }
      if (res.code !== 0 || res.timedOut) {
        throw new WheelBuildError(
          'ConfigurationIncompatible',
          `"${python}" failed while determining the platform tag`,
          { python, exitCode: res.code, stderr: res.stderr },
        );
      }
      return parseProbeOutput(res.stdout);
    },
  };
}

export function parseProbeOutput(stdout: string): Tag {
  const line = stdout.trim().split(/\r?\n/).pop() ?? '';
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    raw = null;
  }
  const parsed = TagSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WheelBuildError('ConfigurationIncompatible', 'no compatible platform tag found', {
      output: stdout,
    });
  }
  return parsed.data;
}

export function supportsPython2(interpreterRange: string): boolean {
  return allowsAny(interpreterRange, PYTHON2_RANGE);
}

export async function resolveTag(
  requiresNativeBuild: boolean,
  interpreterRange: string,
  probe: HostTagProbe,
): Promise<Tag> {
  if (requiresNativeBuild) {
    return probe.probe();
  }
  return {
    interpreter: supportsPython2(interpreterRange) ? 'py2.py3' : 'py3',
    abi: 'none',
    platform: 'any',
  };
}
