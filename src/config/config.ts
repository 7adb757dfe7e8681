import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { EchocastConfig } from "./types.js";
import { ConfigError } from "../errors.js";
import { resolveConfigPath, resolveStateDir } from "./paths.js";
import { EchocastSchema } from "./zod-schema.js";

export function parseConfig(raw: unknown, source = "config"): EchocastConfig {
  const parsed = EchocastSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new ConfigError(`${source} is invalid: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function readConfigFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      return {};
    }
    throw err;
  }
  if (!raw.trim()) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function applyEnvOverrides(cfg: EchocastConfig, env: NodeJS.ProcessEnv): EchocastConfig {
  const next: EchocastConfig = { ...cfg };
  const weaviateUrl = env.WEAVIATE_URL?.trim();
  if (weaviateUrl) {
    const current = cfg.vectorIndex?.kind === "weaviate" ? cfg.vectorIndex : undefined;
    next.vectorIndex = {
      ...current,
      kind: "weaviate",
      url: weaviateUrl,
      apiKey: env.WEAVIATE_API_KEY?.trim() || current?.apiKey,
    };
  } else if (cfg.vectorIndex?.kind === "weaviate" && env.WEAVIATE_API_KEY?.trim()) {
    next.vectorIndex = { ...cfg.vectorIndex, apiKey: env.WEAVIATE_API_KEY.trim() };
  }
  const openaiKey = env.OPENAI_API_KEY?.trim();
  if (openaiKey) {
    next.embeddings = {
      ...cfg.embeddings,
      provider: cfg.embeddings?.provider ?? "openai",
      apiKey: cfg.embeddings?.apiKey ?? openaiKey,
    };
  }
  return next;
}

export function loadConfig(
  opts: { env?: NodeJS.ProcessEnv; configPath?: string } = {},
): EchocastConfig {
  const env = opts.env ?? process.env;
  const filePath = opts.configPath ?? resolveConfigPath(env, os.homedir);
  const cfg = parseConfig(readConfigFile(filePath), filePath);
  return applyEnvOverrides(cfg, env);
}

export function resolveStoragePaths(
  cfg: EchocastConfig,
  env: NodeJS.ProcessEnv = process.env,
): { eventsPath: string; outcomesPath: string } {
  const stateDir = resolveStateDir(env, os.homedir);
  const resolve = (value: string | undefined, fallback: string) =>
    value ? path.resolve(stateDir, value) : path.join(stateDir, fallback);
  return {
    eventsPath: resolve(cfg.storage?.eventsPath, path.join("events", "events.ndjson")),
    outcomesPath: resolve(cfg.storage?.outcomesPath, path.join("outcomes", "returns.ndjson")),
  };
}
