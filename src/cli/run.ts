import { applyVerbosity, loadRuntimeConfig, report, type CommonCommandOptions } from "@/cli/helpers";
import { runReconcile } from "@/core/run";

export interface RunCommandOptions extends CommonCommandOptions {
  dryRun?: boolean;
}

export async function runCommand(options: RunCommandOptions): Promise<void> {
  applyVerbosity(options);
  const config = await loadRuntimeConfig(options.config, options.only);
  const result = await runReconcile(config, { dryRun: options.dryRun });
  report(result, options.json);
}
