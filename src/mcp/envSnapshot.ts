import type { JsonObject } from "../core/json.js";
import type { RuntimeConfig } from "../config/runtimeConfig.js";

export function envSnapshot(config: RuntimeConfig): JsonObject {
  return {
    node: process.version,
    mode: config.databaseUrl ? "postgres" : "pg-mem",
    pipeline_interface: config.pipelineInterfacePath,
    genome_config: config.genomeConfigPath,
    project_config: config.projectConfigPath,
    output_dir: config.outputDir
  };
}
