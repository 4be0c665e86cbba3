import { applyOnlyProviders, loadConfig } from "@/config/loader";
import type { AppConfig } from "@/config/schema";
import { printRunSummary, toJsonReport } from "@/core/output";
import type { RunResult } from "@/core/types";
import { consola } from "consola";

export interface CommonCommandOptions {
  config?: string;
  only: string[];
  json?: boolean;
  verbose?: boolean;
}

export function collectOnly(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export async function loadRuntimeConfig(configPath: string | undefined, only: string[]): Promise<AppConfig> {
  const config = await loadConfig(configPath);
  return applyOnlyProviders(config, only);
}

export function applyVerbosity(options: Pick<CommonCommandOptions, "verbose" | "json">): void {
  // JSON output owns stdout; keep the log quiet unless asked
  if (options.verbose) {
    consola.level = 4;
  } else if (options.json) {
    consola.level = 1;
  }
}

export function report(result: RunResult, json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify(toJsonReport(result), null, 2));
  } else {
    printRunSummary(result);
  }

  if (!result.success) {
    process.exitCode = 1;
  }
}
