import { resolve } from "node:path";
import { isFilterType } from "./filter.js";
import { parsePathExpression } from "./node-parser.js";
import type { FilterType } from "./types.js";

export interface FilterServerConfig {
  name: string;
  defaultFilter: FilterType;
  presets: Record<string, string>;
  maxInputBytes: number;
  logPath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_NAME = "json-path-filter";
const DEFAULT_MAX_INPUT_BYTES = 5_000_000;
const PRESET_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

function getArg(argv: readonly string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1 || !argv[idx + 1]) return undefined;
  return argv[idx + 1];
}

function getAllArgs(argv: readonly string[], flag: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === flag && argv[i + 1]) {
      values.push(argv[i + 1]);
    }
  }
  return values;
}

export function interpolateEnv(
  value: string,
  env: Record<string, string | undefined> = process.env
): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    const envValue = env[varName];
    if (envValue === undefined) {
      throw new ConfigError(`Environment variable ${varName} is not set`);
    }
    return envValue;
  });
}

export const USAGE = `Usage: json-path-filter-mcp [--name <name>] [--default-filter inclusion|exclusion] [--preset "name=expression"]...

Optional:
  --name              Server name (default: "${DEFAULT_NAME}")
  --default-filter    Filter used when a call names none: "inclusion" (default) or "exclusion"
  --preset            Named path expression as "name=expression" (repeatable),
                      e.g. --preset "summary=id,name,owner(login)"
  --max-input-bytes   Largest document accepted, in bytes (default: ${DEFAULT_MAX_INPUT_BYTES})
  --log               Path to request log file (NDJSON format)

All values support \${ENV_VAR} interpolation.`;

/**
 * Read configuration from command-line arguments. Throws `ConfigError` on
 * any invalid flag value.
 */
export function parseConfig(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env
): FilterServerConfig {
  const nameArg = getArg(argv, "--name");
  const name = nameArg ? interpolateEnv(nameArg, env) : DEFAULT_NAME;

  const filterArg = getArg(argv, "--default-filter");
  const defaultFilter = filterArg ? interpolateEnv(filterArg, env) : "inclusion";
  if (!isFilterType(defaultFilter)) {
    throw new ConfigError(
      `Invalid --default-filter "${defaultFilter}". Must be "inclusion" or "exclusion".`
    );
  }

  const presets: Record<string, string> = {};
  for (const raw of getAllArgs(argv, "--preset")) {
    const eqIdx = raw.indexOf("=");
    if (eqIdx === -1) {
      throw new ConfigError(`Invalid --preset format "${raw}". Expected "name=expression"`);
    }
    const presetName = raw.slice(0, eqIdx).trim();
    if (!PRESET_NAME_PATTERN.test(presetName)) {
      throw new ConfigError(
        `Invalid preset name "${presetName}". Use letters, digits, "_" or "-".`
      );
    }
    const expression = interpolateEnv(raw.slice(eqIdx + 1), env).trim();
    try {
      parsePathExpression(expression);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Invalid expression for preset "${presetName}": ${message}`);
    }
    presets[presetName] = expression;
  }

  const maxArg = getArg(argv, "--max-input-bytes");
  let maxInputBytes = DEFAULT_MAX_INPUT_BYTES;
  if (maxArg) {
    maxInputBytes = Number(interpolateEnv(maxArg, env));
    if (!Number.isInteger(maxInputBytes) || maxInputBytes <= 0) {
      throw new ConfigError(`Invalid --max-input-bytes "${maxArg}". Must be a positive integer.`);
    }
  }

  const logArg = getArg(argv, "--log");

  return {
    name,
    defaultFilter,
    presets,
    maxInputBytes,
    logPath: logArg ? resolve(interpolateEnv(logArg, env)) : undefined,
  };
}

export function loadConfig(): FilterServerConfig {
  try {
    return parseConfig(process.argv.slice(2));
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      console.error(`ERROR: ${error.message}`);
      console.error(USAGE);
      process.exit(1);
    }
    throw error;
  }
}
