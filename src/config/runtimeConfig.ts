import path from "path";
import { expandEnvToken, type Env } from "../core/env.js";

export interface RuntimeConfig {
  pipelineInterfacePath: string;
  genomeConfigPath: string | null;
  projectConfigPath: string | null;
  outputDir: string;
  databaseUrl: string | null;
  autoSchema: boolean;
  schemaPath: string;
}

function nonBlank(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function runtimeConfigFromEnv(env: Env): RuntimeConfig {
  return {
    pipelineInterfacePath: nonBlank(env.PIPELINE_INTERFACE_PATH) ?? "pipelines/peppro/pipeline_interface.yaml",
    // Same fallback the pipeline interface's refgenie_config template uses.
    genomeConfigPath: nonBlank(env.GENOME_CONFIG_PATH) ?? expandEnvToken("$REFGENIE", env),
    projectConfigPath: nonBlank(env.PROJECT_CONFIG_PATH),
    outputDir: nonBlank(env.OUTPUT_DIR) ?? "var/output",
    databaseUrl: nonBlank(env.DATABASE_URL),
    autoSchema: (env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false",
    schemaPath: nonBlank(env.SCHEMA_PATH) ?? "db/schema.sql"
  };
}

export function resultsSubdirFor(outputDir: string): string {
  return path.join(outputDir, "results_pipeline");
}
