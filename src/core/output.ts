import type { RunResult } from "@/core/types";
import { consola } from "consola";

export function printRunSummary(result: RunResult): void {
  const elapsed = (result.elapsedMs / 1000).toFixed(2);
  consola.info(`Mode: ${result.dryRun ? "dry-run" : "apply"}`);

  for (const item of result.items) {
    const label = `[${item.kind}/${item.name}]`;
    if (item.failed) {
      consola.error(`${label} ${item.msg}`);
    } else if (item.changed) {
      consola.success(`${label} ${item.msg}`);
    } else {
      consola.info(`${label} ${item.msg}`);
    }
  }

  const changed = result.items.filter((item) => item.changed).length;
  const failed = result.items.filter((item) => item.failed).length;
  consola.info(`Items: ${result.items.length} | Changed: ${changed} | Failed: ${failed}`);

  if (result.success) {
    consola.success(`Completed in ${elapsed}s`);
  } else {
    consola.error(`Completed with errors in ${elapsed}s`);
  }
}

/** JSON document printed by `--json`: one entry per item, in run order. */
export function toJsonReport(result: RunResult) {
  return {
    success: result.success,
    dryRun: result.dryRun,
    elapsedMs: result.elapsedMs,
    items: result.items.map((item) =>
      item.failed
        ? { kind: item.kind, name: item.name, action: item.action, failed: true, msg: item.msg }
        : { kind: item.kind, name: item.name, action: item.action, ...item.result },
    ),
  };
}
