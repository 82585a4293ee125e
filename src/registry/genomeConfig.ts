import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { expandEnvVars, hasUnexpandedEnvRef, type Env } from "../core/env.js";
import { InMemoryAssetRegistry } from "./assetRegistry.js";

export class GenomeConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenomeConfigError";
  }
}

const DEFAULT_TAG = "default";

const zTag = z.object({
  seek_keys: z.record(z.string(), z.union([z.string(), z.number()])).default({})
});

const zAsset = z.object({
  default_tag: z.string().min(1).optional(),
  tags: z.record(z.string(), zTag).default({})
});

const zGenomeConfig = z.object({
  genome_folder: z.string().min(1),
  genomes: z
    .record(
      z.string(),
      z.object({
        assets: z.record(z.string(), zAsset).default({})
      })
    )
    .default({})
});

export type GenomeConfig = z.infer<typeof zGenomeConfig>;

function seekPath(folder: string, genome: string, asset: string, tag: string, value: string): string {
  if (path.isAbsolute(value)) return value;
  return path.join(folder, genome, asset, tag, value);
}

/**
 * Flattens a refgenie-style genome config into a registry. Only each asset's
 * default tag is exposed; assets whose default tag is not listed are skipped.
 */
export function registryFromGenomeConfig(config: GenomeConfig, baseDir: string, env: Env): InMemoryAssetRegistry {
  const expandedFolder = expandEnvVars(config.genome_folder, env);
  if (hasUnexpandedEnvRef(expandedFolder)) {
    throw new GenomeConfigError(`genome_folder references an unset variable: ${config.genome_folder}`);
  }
  const folder = path.resolve(baseDir, expandedFolder);

  const assets: Record<string, Record<string, Record<string, string>>> = {};
  for (const [genome, genomeEntry] of Object.entries(config.genomes)) {
    const byAsset: Record<string, Record<string, string>> = {};
    for (const [asset, assetEntry] of Object.entries(genomeEntry.assets)) {
      const tag = assetEntry.default_tag ?? DEFAULT_TAG;
      const tagEntry = assetEntry.tags[tag];
      if (!tagEntry) continue;

      const seekKeys: Record<string, string> = {};
      for (const [key, raw] of Object.entries(tagEntry.seek_keys)) {
        seekKeys[key] = seekPath(folder, genome, asset, tag, String(raw));
      }
      byAsset[asset] = seekKeys;
    }
    assets[genome] = byAsset;
  }
  return new InMemoryAssetRegistry(assets);
}

export async function loadGenomeConfig(filePath: string, env: Env): Promise<InMemoryAssetRegistry> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed = zGenomeConfig.safeParse(YAML.parse(raw));
  if (!parsed.success) {
    throw new GenomeConfigError(`invalid genome config at ${filePath}: ${z.prettifyError(parsed.error)}`);
  }
  return registryFromGenomeConfig(parsed.data, path.dirname(path.resolve(filePath)), env);
}
