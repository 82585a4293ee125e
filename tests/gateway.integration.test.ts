import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdtemp, rm } from "fs/promises";
import os from "os";
import path from "path";
import type * as pg from "pg";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema, ListToolsResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { loadPipelineRuntime, type PipelineRuntime } from "../src/config/loadRuntime.js";
import { applySqlFile, createDb, createMemoryPool } from "../src/db/connection.js";
import { createGatewayServer } from "../src/mcp/gatewayServer.js";
import {
  zPipelineCommandResolveOutput,
  zProjectCommandsResolveOutput,
  zSubmissionGetOutput
} from "../src/mcp/toolSchemas.js";
import { PostgresStore } from "../src/store/postgresStore.js";

const EXE = path.resolve("pipelines/peppro/peppro.py");
const G = "/data/genomes";

const HG38_DEFAULTS = [
  "--genome-index",
  `${G}/hg38/bowtie2_index/default`,
  "--chrom-sizes",
  `${G}/hg38/fasta/default/hg38.chrom.sizes`,
  "--prealignment-index",
  `human_rDNA=${G}/human_rDNA/bowtie2_index/default`,
  "--TSS-name",
  `${G}/hg38/refgene_anno/default/hg38_TSS.bed`,
  "--pi-tss",
  `${G}/hg38/ensembl_gtf/default/hg38_ensembl_TSS.bed`,
  "--pi-body",
  `${G}/hg38/ensembl_gtf/default/hg38_ensembl_gene_body.bed`,
  "--pre-name",
  `${G}/hg38/refgene_anno/default/hg38_pre-mRNA.bed`,
  "--exon-name",
  `${G}/hg38/refgene_anno/default/hg38_exons.bed`,
  "--intron-name",
  `${G}/hg38/refgene_anno/default/hg38_introns.bed`,
  "--anno-name",
  `${G}/hg38/feat_annotation/default/hg38_annotations.bed.gz`
];

describe.sequential("gateway (in-memory)", () => {
  let tmpDir: string;
  let readsDir: string;
  let pool: pg.Pool;
  let store: PostgresStore;
  let runtime: PipelineRuntime;
  let client: Client;
  let serverTransport: InMemoryTransport;
  let clientTransport: InMemoryTransport;

  async function connect(rt: PipelineRuntime): Promise<{ client: Client; close: () => Promise<void> }> {
    const server = createGatewayServer({ store, runtime: rt, outputDir: path.join(tmpDir, "default-out") });
    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    await server.connect(serverSide);
    const c = new Client({ name: "peprun-test-client", version: "0.0.0" });
    await c.connect(clientSide);
    return {
      client: c,
      close: async () => {
        await clientSide.close();
        await serverSide.close();
      }
    };
  }

  async function callTool(name: string, args: Record<string, unknown>, c: Client = client) {
    const result = await c.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
    if (result.isError) {
      throw new Error(`${name} failed: ${result.content.map((x) => (x.type === "text" ? x.text : x.type)).join("\n")}`);
    }
    return result.structuredContent;
  }

  async function callToolError(name: string, args: Record<string, unknown>, c: Client = client): Promise<string> {
    try {
      const result = await c.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
      if (!result.isError) return "<no error>";
      return result.content.map((x) => (x.type === "text" ? x.text : x.type)).join("\n");
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "peprun-"));
    readsDir = path.join(tmpDir, "reads");

    pool = createMemoryPool();
    await applySqlFile(pool, path.resolve("db/schema.sql"));
    store = new PostgresStore(createDb(pool));

    runtime = await loadPipelineRuntime(
      {
        pipelineInterfacePath: path.resolve("pipelines/peppro/pipeline_interface.yaml"),
        genomeConfigPath: path.resolve("tests/fixtures/genomes/genome_config.yaml"),
        projectConfigPath: path.resolve("tests/fixtures/project/project_config.yaml")
      },
      { GENOMES: G, DATA: readsDir, PROJECT_OUT: tmpDir }
    );

    const server = createGatewayServer({ store, runtime, outputDir: path.join(tmpDir, "default-out") });
    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: "peprun-test-client", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterAll(async () => {
    await clientTransport.close();
    await serverTransport.close();
    await pool.end();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("lists tools", async () => {
    const result = await client.request({ method: "tools/list", params: {} }, ListToolsResultSchema);
    expect(result.tools.map((t) => t.name).sort()).toEqual([
      "pipeline_command_resolve",
      "project_commands_resolve",
      "submission_get"
    ]);
  });

  it("resolves one sample and replays the same request", async () => {
    const args = {
      sample: {
        sample_name: "adhoc",
        genome: "hg38",
        read1: "/nonexistent/adhoc.fastq.gz",
        read_type: "SINGLE",
        umi_len: 8,
        prealignment_names: ["human_rDNA", "nope"]
      },
      compute: { cores: 2, mem: "4000" },
      output_dir: "/out"
    };

    const first = zPipelineCommandResolveOutput.parse(await callTool("pipeline_command_resolve", args));
    expect(first.submission_id).toMatch(/^sub_[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(first.sample_name).toBe("adhoc");
    expect(first.replayed).toBe(false);
    expect(first.warnings).toEqual([]);
    expect(first.argv.slice(0, 19)).toEqual([
      EXE,
      "--sample-name",
      "adhoc",
      "--genome",
      "hg38",
      "--input",
      "/nonexistent/adhoc.fastq.gz",
      "--single-or-paired",
      "SINGLE",
      "-O",
      "/out/results_pipeline",
      "-P",
      "2",
      "-M",
      "4000",
      "--umi-len",
      "8",
      "--genome-index",
      `${G}/hg38/bowtie2_index/default`
    ]);
    expect(first.diagnostics).toEqual([
      {
        code: "invalid_list_expansion",
        flag: "--prealignment-index",
        message: "--prealignment-index: skipped nope (no bowtie2_index.dir asset)"
      }
    ]);

    const second = zPipelineCommandResolveOutput.parse(await callTool("pipeline_command_resolve", args));
    expect(second.replayed).toBe(true);
    expect(second.submission_id).toBe(first.submission_id);
    expect(second.command).toBe(first.command);

    const got = zSubmissionGetOutput.parse(await callTool("submission_get", { submission_id: first.submission_id }));
    expect(got.submission.status).toBe("resolved");
    expect(got.submission.batch_id).toBeNull();
    expect(got.submission.pipeline_name).toBe("PEPPRO");
    expect(got.submission.interface_hash).toBe(runtime.pipeline.interfaceHash);
    expect(got.submission.registry_digest).toBe(runtime.registry.digest);
    expect(got.submission.argv).toEqual(first.argv);
    expect(got.events.map((e) => e.kind)).toEqual(["submission.started", "resolve.diagnostic", "submission.resolved"]);
  });

  it("gives a different submission for different compute", async () => {
    const sample = { sample_name: "adhoc2", genome: "hg38", read1: "/nonexistent/a.fq.gz", read_type: "SINGLE" };
    const a = zPipelineCommandResolveOutput.parse(
      await callTool("pipeline_command_resolve", { sample, compute: { cores: 2, mem: "4000" } })
    );
    const b = zPipelineCommandResolveOutput.parse(
      await callTool("pipeline_command_resolve", { sample, compute: { cores: 3, mem: "4000" } })
    );
    expect(b.submission_id).not.toBe(a.submission_id);
    expect(a.argv[10]).toBe(path.join(tmpDir, "default-out", "results_pipeline"));
  });

  it("returns and records compute warnings for missing read files", async () => {
    const read1 = `${readsDir}/sized_R1.fastq.gz`;
    const out = zPipelineCommandResolveOutput.parse(
      await callTool("pipeline_command_resolve", {
        sample: { sample_name: "sized", genome: "hg38", read1, read_type: "SINGLE" }
      })
    );
    const warning = `input file not found, counted as 0 bytes: ${read1}`;
    expect(out.warnings).toEqual([warning]);
    expect(out.argv.slice(11, 15)).toEqual(["-P", "1", "-M", "12000"]);

    const got = zSubmissionGetOutput.parse(await callTool("submission_get", { submission_id: out.submission_id }));
    expect(got.events[0]?.kind).toBe("submission.started");
    expect(got.events.filter((e) => e.kind === "compute.warning").map((e) => e.message)).toEqual([warning]);
    expect(got.events[got.events.length - 1]?.kind).toBe("submission.resolved");
  });

  it("reports a missing required attribute as a tool error", async () => {
    const text = await callToolError("pipeline_command_resolve", {
      sample: { sample_name: "broken", genome: "hg38" },
      compute: { cores: 1, mem: "1000" }
    });
    expect(text).toContain("sample broken is missing required attributes: read1, read_type");
  });

  it("resolves the configured project as one batch", async () => {
    const out = zProjectCommandsResolveOutput.parse(await callTool("project_commands_resolve", {}));
    expect(out.batch_id).toMatch(/^batch_[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(out.project_name).toBe("tutorial");
    expect(out.resolved_count).toBe(2);
    expect(out.failed_count).toBe(1);
    expect(out.submissions.map((s) => [s.sample_name, s.status])).toEqual([
      ["pro_single", "resolved"],
      ["pro_paired", "resolved"],
      ["odd, name", "failed"]
    ]);
    expect(out.warnings).toEqual([
      "sample odd, name: cannot derive read2 from R3, missing flowcell",
      `pro_single: input file not found, counted as 0 bytes: ${readsDir}/pro_single_R1.fastq.gz`,
      `pro_paired: input file not found, counted as 0 bytes: ${readsDir}/pro_paired_R1.fastq.gz`,
      `pro_paired: input file not found, counted as 0 bytes: ${readsDir}/pro_paired_R2.fastq.gz`,
      `odd, name: input file not found, counted as 0 bytes: ${readsDir}/odd, name_R1.fastq.gz`
    ]);

    const [single, , odd] = out.submissions;
    // Zero-byte inputs select the smallest resource package.
    expect(single?.argv).toEqual([
      EXE,
      "--sample-name",
      "pro_single",
      "--genome",
      "hg38",
      "--input",
      `${readsDir}/pro_single_R1.fastq.gz`,
      "--single-or-paired",
      "SINGLE",
      "-O",
      `${tmpDir}/peppro/results_pipeline`,
      "-P",
      "1",
      "-M",
      "12000",
      "--protocol",
      "PRO",
      ...HG38_DEFAULTS
    ]);
    expect(single?.diagnostics).toEqual([]);
    expect(odd?.argv).toBeNull();
    expect(odd?.error).toBe("sample odd, name is missing required attribute: genome");

    const again = zProjectCommandsResolveOutput.parse(await callTool("project_commands_resolve", { limit: 2 }));
    expect(again.batch_id).not.toBe(out.batch_id);
    expect(again.submissions.map((s) => s.replayed)).toEqual([true, true]);
    expect(again.submissions.map((s) => s.submission_id)).toEqual(out.submissions.slice(0, 2).map((s) => s.submission_id));

    if (!odd) throw new Error("missing failed submission");
    const failed = zSubmissionGetOutput.parse(await callTool("submission_get", { submission_id: odd.submission_id }));
    expect(failed.submission.batch_id).toBe(out.batch_id);
    expect(failed.submission.status).toBe("failed");
    expect(failed.events.map((e) => e.kind)).toEqual(["submission.started", "compute.warning", "submission.failed"]);
    expect(failed.events[1]?.message).toBe(`input file not found, counted as 0 bytes: ${readsDir}/odd, name_R1.fastq.gz`);
    expect(failed.events[2]?.message).toBe("sample odd, name is missing required attribute: genome");
  });

  it("rejects unknown and malformed submission ids", async () => {
    const unknownId = `sub_${"0".repeat(26)}`;
    expect(await callToolError("submission_get", { submission_id: unknownId })).toContain(`unknown submission_id: ${unknownId}`);
    expect(await callToolError("submission_get", { submission_id: "run_123" })).not.toBe("<no error>");
  });

  it("refuses project resolution without a project", async () => {
    const bare = await connect({ ...runtime, project: null });
    try {
      expect(await callToolError("project_commands_resolve", {}, bare.client)).toContain(
        "no project configured (set PROJECT_CONFIG_PATH)"
      );
    } finally {
      await bare.close();
    }
  });
});
