/**
 * sublisp config - effective configuration summary command
 */
import { resolveConfig, toEvalLimits, ConfigError, DEFAULT_MAX_DEPTH, formatDiagnostic } from "@sublisp/core";
import type { ResolvedConfig } from "@sublisp/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(formatDiagnostic({ code: e.code, message: e.message }, !opts.json));
      return 4;
    }
    throw e;
  }

  const limits = toEvalLimits(resolved.config);

  if (opts.json) {
    console.log(
      JSON.stringify(
        {
          source: resolved.source,
          path: resolved.path,
          config: resolved.config,
        },
        null,
        2
      )
    );
    return 0;
  }

  const show = (n: number | undefined): string => (n === undefined ? "(none)" : String(n));

  console.log("Effective sublisp config");
  console.log(`  Source:       ${resolved.source}`);
  console.log(`  Path:         ${resolved.path ?? "(none)"}`);
  console.log(`  Max depth:    ${limits.maxDepth ?? DEFAULT_MAX_DEPTH}`);
  console.log(`  Max steps:    ${show(limits.maxSteps)}`);
  console.log(`  Time limit:   ${limits.timeMs === undefined ? "(none)" : `${limits.timeMs}ms`}`);
  console.log(`  Strict arity: ${resolved.config.strictArity ? "on" : "off"}`);
  return 0;
}
