import type { ValidationReport } from "../core/configuration-core.js";
import { openCore, type GlobalOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";
import { diag, failure, type CommandResult } from "./result.js";

/**
 * Validate one module (or all of them) in an environment. An invalid
 * configuration is a failed result carrying the full report in `details`.
 */
export async function validate(
  opts: GlobalOptions,
  args: { module?: string; environment?: string } = {},
): Promise<CommandResult<ValidationReport>> {
  let report: ValidationReport;
  try {
    const core = await openCore(opts);
    try {
      report = await core.validateConfiguration(args.module, { environment: args.environment });
    } finally {
      core.close();
    }
  } catch (err) {
    return failure(err);
  }

  if (report.valid) return { ok: true, value: report };

  const failing = Object.entries(report.results)
    .filter(([, r]) => !r.valid)
    .map(([name, r]) => `${name}: ${r.errors.join("; ")}`);
  return {
    ok: false,
    error: diag("error", "VALIDATION_FAILED", `Configuration invalid in ${report.environment}: ${failing.join(" | ")}`, {
      details: { environment: report.environment, results: report.results },
    }),
    exitCode: EXIT.VALIDATION_FAILED,
  };
}
