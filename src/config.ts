import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { BackendPreference } from "./vectorizer";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };

// Centralized single dotenv.config() call. Prefer the project-root .env next
// to package.json, fall back to the working directory.
(() => {
  const rootEnv = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export interface Config {
  POLICY_ROOT: string;
  ALLOWED_EXT: string[];
  EXCLUDED_FOLDERS: string[];
  VERBOSE: boolean;
  VECTOR_BACKEND: BackendPreference;
  MODEL_NAME: string | undefined;
  MAX_FEATURES: number;
  DEFAULT_TOP_K: number;
  MAX_TOP_K: number;
  DROP_BOILERPLATE: boolean;
  CONTEXT_MAX_CHARS: number;
  CLAUSE_STORE_DIR: string | undefined;
  CACHE_DIR: string;
  MCP_TRANSPORT: string;
}

type Env = Record<string, string | undefined>;

function list(raw: string | undefined, fallback: string[]): string[] {
  const items = raw
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items?.length ? items : fallback;
}

// Tolerant truthy parsing (supports several common forms).
function flag(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/** Positive integer from env, clamped to `max`; malformed values use the default. */
function positiveInt(raw: string | undefined, fallback: number, max: number): number {
  const s = raw?.trim();
  if (!s) return fallback;
  const n = Number(s);
  return Number.isFinite(n) && n >= 1 ? Math.min(max, Math.floor(n)) : fallback;
}

/** Parse runtime configuration. Pure over `env` so tests can pass their own. */
export function getConfig(env: Env = process.env): Config {
  // Folder scanned by list_policies / ingest_policy. Defaults to the working directory.
  const POLICY_ROOT = path.resolve(env.POLICY_ROOT?.trim() || process.cwd());

  const ALLOWED_EXT = list(env.ALLOWED_EXT, ["pdf", "txt"]);
  const EXCLUDED_FOLDERS = list(env.EXCLUDED_FOLDERS, [
    "node_modules",
    "dist",
    "build",
    ".git",
    ".cache",
    "coverage",
  ]);

  const VERBOSE = flag(env.VERBOSE);

  // 'sparse' skips loading the embedding model entirely; anything else is 'auto'.
  const VECTOR_BACKEND: BackendPreference =
    (env.VECTOR_BACKEND ?? "").trim().toLowerCase() === "sparse" ? "sparse" : "auto";
  // Unset means the embeddings module default.
  const MODEL_NAME = env.MODEL_NAME?.trim() || undefined;

  const MAX_FEATURES = positiveInt(env.MAX_FEATURES, 1000, 100_000);
  const MAX_TOP_K = positiveInt(env.MAX_TOP_K, 50, 500);
  const DEFAULT_TOP_K = Math.min(MAX_TOP_K, positiveInt(env.DEFAULT_TOP_K, 5, 500));
  const DROP_BOILERPLATE = flag(env.DROP_BOILERPLATE);
  const CONTEXT_MAX_CHARS = positiveInt(env.CONTEXT_MAX_CHARS, 6000, 200_000);

  // Optional directory for clause archives; unset disables archiving.
  const storeDir = env.CLAUSE_STORE_DIR?.trim();
  const CLAUSE_STORE_DIR = storeDir ? path.resolve(storeDir) : undefined;
  // PDF text cache lives with the archives, or in a project-local .cache.
  const CACHE_DIR = CLAUSE_STORE_DIR ?? path.resolve(process.cwd(), ".cache");

  // Transport mode: 'stdio' (default) or 'http'/'streamable-http'.
  const MCP_TRANSPORT = (env.MCP_TRANSPORT ?? "").trim().toLowerCase();

  return {
    POLICY_ROOT,
    ALLOWED_EXT,
    EXCLUDED_FOLDERS,
    VERBOSE,
    VECTOR_BACKEND,
    MODEL_NAME,
    MAX_FEATURES,
    DEFAULT_TOP_K,
    MAX_TOP_K,
    DROP_BOILERPLATE,
    CONTEXT_MAX_CHARS,
    CLAUSE_STORE_DIR,
    CACHE_DIR,
    MCP_TRANSPORT,
  };
}
