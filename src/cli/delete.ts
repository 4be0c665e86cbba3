import { applyVerbosity, loadRuntimeConfig, report, type CommonCommandOptions } from "@/cli/helpers";
import { runReconcile } from "@/core/run";

export interface DeleteCommandOptions extends CommonCommandOptions {
  dryRun?: boolean;
}

export async function deleteCommand(options: DeleteCommandOptions): Promise<void> {
  applyVerbosity(options);
  const config = await loadRuntimeConfig(options.config, options.only);
  const result = await runReconcile(config, { dryRun: options.dryRun, deleteAll: true });
  report(result, options.json);
}
