/**
 * Config Loading + Validation
 *
 * Defaults, then an optional JSON config file, then command-line flags.
 */

import { readFile } from "node:fs/promises";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { WalletConfig } from "./types.js";
import { InvalidInputError } from "./errors.js";

/** Values used for anything the config file and flags leave out */
export const DEFAULTS: WalletConfig = {
  api: {
    address: "localhost:9380",
  },
  signer: {
    mode: "device",
    seedEnv: "SIAWATCH_SEED",
  },
  device: {
    bridgeUrl: "http://127.0.0.1:5000",
    timeoutMs: 120_000,
  },
  network: {
    asicHardforkHeight: 179_000,
    foundationHardforkHeight: 298_000,
  },
  wallet: {
    indexSource: "scan",
  },
  donations: {
    enabled: true,
  },
};

const WalletConfigSchema = Type.Object({
  api: Type.Object({ address: Type.String({ minLength: 1 }) }),
  signer: Type.Object({
    mode: Type.Union([Type.Literal("device"), Type.Literal("hot")]),
    seedEnv: Type.String({ minLength: 1 }),
  }),
  device: Type.Object({
    bridgeUrl: Type.String({ minLength: 1 }),
    timeoutMs: Type.Integer({ minimum: 1 }),
  }),
  network: Type.Object({
    asicHardforkHeight: Type.Integer({ minimum: 0 }),
    foundationHardforkHeight: Type.Integer({ minimum: 0 }),
  }),
  wallet: Type.Object({
    indexSource: Type.Union([Type.Literal("scan"), Type.Literal("service")]),
  }),
  donations: Type.Object({ enabled: Type.Boolean() }),
});

const UNSAFE_KEYS = new Set(["__proto__", "constructor", "prototype"]);

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Merge source into target, preferring source values.
 * Only merges plain objects; arrays and primitives are replaced.
 */
function deepMerge(target: unknown, source: unknown): unknown {
  if (!isRecord(target) || !isRecord(source)) {
    return source === undefined ? target : source;
  }
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    if (srcVal === undefined || UNSAFE_KEYS.has(key)) continue;
    result[key] = isRecord(srcVal) && isRecord(result[key]) ? deepMerge(result[key], srcVal) : srcVal;
  }
  return result;
}

/**
 * Parse and validate a config object.
 * Returns a fully-populated WalletConfig with defaults applied.
 *
 * @throws InvalidInputError naming the first offending key
 */
export function parseWalletConfig(raw: unknown): WalletConfig {
  if (raw === undefined || raw === null) {
    return structuredClone(DEFAULTS);
  }
  if (!isRecord(raw)) {
    throw new InvalidInputError("siawatch: config must be a JSON object");
  }

  const cfg = deepMerge(structuredClone(DEFAULTS), raw);
  if (!Value.Check(WalletConfigSchema, cfg)) {
    const first = Value.Errors(WalletConfigSchema, cfg).First();
    const where = first ? first.path.replace(/^\//, "").replace(/\//g, ".") : "config";
    throw new InvalidInputError(`siawatch: invalid config value at "${where}": ${first?.message ?? "unknown error"}`);
  }
  if (cfg.network.foundationHardforkHeight < cfg.network.asicHardforkHeight) {
    throw new InvalidInputError("siawatch: network.foundationHardforkHeight must not precede asicHardforkHeight");
  }
  return cfg;
}

/** Read a JSON config file. */
export async function loadConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`siawatch: cannot read config file ${path}: ${msg}`);
  }
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`siawatch: config file ${path} is not valid JSON: ${msg}`);
  }
}

/** Command-line overrides; undefined means "not given" */
export interface ConfigFlags {
  api?: string;
  hot?: boolean;
}

/**
 * Resolve the effective config: defaults ← file ← flags.
 */
export async function resolveConfig(opts: { file?: string; flags?: ConfigFlags }): Promise<WalletConfig> {
  const fromFile = opts.file ? await loadConfigFile(opts.file) : {};
  const cfg = parseWalletConfig(fromFile);
  if (opts.flags?.api !== undefined) {
    if (opts.flags.api.trim() === "") {
      throw new InvalidInputError("siawatch: --api must not be empty");
    }
    cfg.api.address = opts.flags.api;
  }
  if (opts.flags?.hot) {
    cfg.signer.mode = "hot";
  }
  return cfg;
}
