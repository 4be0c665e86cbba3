import { ConfigSchema, type AppConfig } from "@/config/schema";
import { ConfigError } from "@/lib/errors";
import { formatZodError } from "@/lib/zod-issues";
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { access, readFile } from "node:fs/promises";

type Environment = Record<string, string | undefined>;

// Connection settings that may come from the environment instead of the file
const CONNECTION_ENV = {
  url: "MIQ_URL",
  username: "MIQ_USERNAME",
  password: "MIQ_PASSWORD",
} as const;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function resolveConfigPath(explicitPath?: string): Promise<string> {
  if (explicitPath) return explicitPath;
  if (await exists("./config.jsonc")) return "./config.jsonc";
  if (await exists("./config.json")) return "./config.json";
  throw new ConfigError("No config file found (tried config.jsonc, config.json)");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function withConnectionDefaults(raw: Record<string, unknown>, env: Environment): Record<string, unknown> {
  const manageiq = isRecord(raw.manageiq) ? { ...raw.manageiq } : {};
  for (const [key, variable] of Object.entries(CONNECTION_ENV)) {
    const value = manageiq[key];
    if (value === undefined || value === null || value === "") {
      manageiq[key] = env[variable];
    }
    if (manageiq[key] === undefined || manageiq[key] === "") {
      throw new ConfigError(`missing required setting: manageiq.${key} (or ${variable})`);
    }
  }
  return { ...raw, manageiq };
}

/** Validates an already-parsed config document, filling connection settings from `env`. */
export function parseConfig(raw: unknown, env: Environment = process.env): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("Config validation failed:\nroot: expected an object");
  }

  const parsed = ConfigSchema.safeParse(withConnectionDefaults(raw, env));
  if (!parsed.success) {
    throw new ConfigError(`Config validation failed:\n${formatZodError(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadConfig(path?: string, env: Environment = process.env): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(path);

  if (!(await exists(resolvedPath))) {
    throw new ConfigError(`Config file not found: ${resolvedPath}`);
  }

  const rawText = await readFile(resolvedPath, "utf8");
  const errors: ParseError[] = [];
  const parsedRaw: unknown = parse(rawText, errors, { allowTrailingComma: true });
  const [firstError] = errors;
  if (firstError) {
    throw new ConfigError(
      `Invalid JSONC in ${resolvedPath}: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`,
    );
  }

  return parseConfig(parsedRaw, env);
}

export function applyOnlyProviders(config: AppConfig, onlyNames: string[]): AppConfig {
  if (onlyNames.length === 0) return config;

  const normalized = onlyNames
    .flatMap((name) => name.split(","))
    .map((name) => name.trim())
    .filter(Boolean);

  if (normalized.length === 0) return config;

  const available = new Set([
    ...config.providers.map((provider) => provider.name),
    ...config.customAttributes.map((target) => target.entityName),
  ]);
  const unknown = normalized.filter((name) => !available.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown name(s): ${unknown.join(", ")}. Available: ${[...available].join(", ")}`);
  }

  const onlySet = new Set(normalized);
  return {
    ...config,
    providers: config.providers.filter((provider) => onlySet.has(provider.name)),
    customAttributes: config.customAttributes.filter((target) => onlySet.has(target.entityName)),
  };
}
