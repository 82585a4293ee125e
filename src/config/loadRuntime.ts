import type { Env } from "../core/env.js";
import { ResourcePackages } from "../compute/resources.js";
import { PipelineInterface } from "../pipeline/pipelineInterface.js";
import { InMemoryAssetRegistry, type AssetRegistry } from "../registry/assetRegistry.js";
import { loadGenomeConfig } from "../registry/genomeConfig.js";
import { loadProject, type Project } from "../samples/project.js";

export interface PipelineRuntime {
  pipeline: PipelineInterface;
  registry: AssetRegistry;
  resources: ResourcePackages | null;
  project: Project | null;
}

/** Loads every file-backed input the resolver needs. Missing optional inputs become empty defaults. */
export async function loadPipelineRuntime(
  paths: { pipelineInterfacePath: string; genomeConfigPath: string | null; projectConfigPath: string | null },
  env: Env
): Promise<PipelineRuntime> {
  const pipeline = await PipelineInterface.loadFromFile(paths.pipelineInterfacePath);
  const resourcesPath = pipeline.resourcesPath();
  const [registry, resources, project] = await Promise.all([
    paths.genomeConfigPath ? loadGenomeConfig(paths.genomeConfigPath, env) : Promise.resolve(InMemoryAssetRegistry.empty()),
    resourcesPath ? ResourcePackages.loadFromFile(resourcesPath) : Promise.resolve(null),
    paths.projectConfigPath ? loadProject(paths.projectConfigPath, env) : Promise.resolve(null)
  ]);
  return { pipeline, registry, resources, project };
}
