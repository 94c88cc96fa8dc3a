/**
 * Model cache location for @xenova/transformers.
 *
 * Both the embedding model and the optional answer generator are downloaded
 * into the same directory on first use; this must run before either pipeline
 * is created.
 */
import fs from "node:fs/promises";
import path from "node:path";
import { env } from "@xenova/transformers";

/**
 * Point the transformers filesystem cache at `cacheDir` (TRANSFORMERS_CACHE),
 * or a `.cache/transformers` folder under the working directory when unset.
 *
 * @returns Directory actually used.
 */
export async function configureTransformersCache(cacheDir: string | undefined): Promise<string> {
  const dir = path.resolve(cacheDir ?? path.join(process.cwd(), ".cache", "transformers"));
  await fs.mkdir(dir, { recursive: true });
  env.useBrowserCache = false;
  env.cacheDir = dir;
  env.allowLocalModels = true;
  console.error(`[RAG] Model cache: ${dir}`);
  return dir;
}
