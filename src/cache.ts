/**
 * Transformers cache configuration utility.
 *
 * Kept apart from the embeddings module so the entry point can point the
 * model cache somewhere before anything creates a pipeline.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@xenova/transformers";

/**
 * Configure the @xenova/transformers cache directory for Node.js execution.
 *
 * @param cacheDir Optional explicit directory. Falls back to TRANSFORMERS_CACHE,
 *                 then a project-local .cache/transformers folder.
 * @returns Resolved cache directory path actually used.
 */
export async function configureTransformersCache(cacheDir?: string): Promise<string> {
  const dir =
    cacheDir?.trim() ||
    process.env.TRANSFORMERS_CACHE?.trim() ||
    path.resolve(process.cwd(), ".cache/transformers");
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false; // ensure filesystem cache in Node
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[Policy] Using transformers cache at: ${env.cacheDir}`);
  return dir;
}
