import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";

import { measureInputSizeGb, parseResourcesTsv, ResourcePackageError, ResourcePackages } from "../src/compute/resources.js";
import { selectCompute } from "../src/compute/selectCompute.js";
import { toSample } from "../src/samples/sample.js";

const TABLE = [
  "max_file_size\tcores\tmem\ttime",
  "NaN\t12\t48000\t01-00:00:00",
  "0.5\t2\t16000\t00-04:00:00",
  "# tiny inputs",
  "0.05\t1\t12000\t",
  "10\t8\t32000\t00-12:00:00"
].join("\n");

describe("resource packages", () => {
  it("parses and sorts by max file size", () => {
    expect(parseResourcesTsv(TABLE)).toEqual([
      { maxFileSizeGb: 0.05, cores: 1, mem: "12000" },
      { maxFileSizeGb: 0.5, cores: 2, mem: "16000", time: "00-04:00:00" },
      { maxFileSizeGb: 10, cores: 8, mem: "32000", time: "00-12:00:00" },
      { maxFileSizeGb: Number.POSITIVE_INFINITY, cores: 12, mem: "48000", time: "01-00:00:00" }
    ]);
  });

  it("selects the smallest package that fits", () => {
    const packages = new ResourcePackages(parseResourcesTsv(TABLE));
    expect(packages.select(0)).toEqual({ cores: 1, mem: "12000" });
    expect(packages.select(0.05)).toEqual({ cores: 1, mem: "12000" });
    expect(packages.select(0.3)).toEqual({ cores: 2, mem: "16000", time: "00-04:00:00" });
    expect(packages.select(500)).toEqual({ cores: 12, mem: "48000", time: "01-00:00:00" });
  });

  it("falls back to the largest package when nothing fits", () => {
    const packages = new ResourcePackages(parseResourcesTsv("max_file_size\tcores\tmem\n1\t1\t4000\n5\t4\t8000\n"));
    expect(packages.select(50)).toEqual({ cores: 4, mem: "8000" });
  });

  it("rejects malformed tables", () => {
    expect(() => parseResourcesTsv("")).toThrow("resources table is empty");
    expect(() => parseResourcesTsv("max_file_size\tcores\n1\t1")).toThrow("missing column: mem");
    expect(() => parseResourcesTsv("max_file_size\tcores\tmem\n")).toThrow("resources table has no packages");
    expect(() => parseResourcesTsv("max_file_size\tcores\tmem\n1\t0\t4000")).toThrow(
      "record 2: cores must be an integer >= 1 (got 0)"
    );
    expect(() => parseResourcesTsv("max_file_size\tcores\tmem\n1\t1\t4G")).toThrow(ResourcePackageError);
    expect(() => parseResourcesTsv("max_file_size\tcores\tmem\nbig\t1\t4000")).toThrow("record 2: invalid max_file_size: big");
  });

  it("loads the PEPPRO table", async () => {
    const packages = await ResourcePackages.loadFromFile(path.resolve("pipelines/peppro/resources.tsv"));
    expect(packages.list()).toHaveLength(5);
    expect(packages.select(0.01)).toEqual({ cores: 1, mem: "12000", time: "00-01:00:00" });
  });
});

describe("input sizing", () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await mkdtemp(path.join(os.tmpdir(), "peprun-resources-"));
    await writeFile(path.join(tmpDir, "r1.fastq.gz"), Buffer.alloc(1024));
    await writeFile(path.join(tmpDir, "r2.fastq.gz"), Buffer.alloc(3072));
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("sums file sizes in GiB and reports missing files", async () => {
    const missing = path.join(tmpDir, "missing.fastq.gz");
    const { sizeGb, warnings } = await measureInputSizeGb([path.join(tmpDir, "r1.fastq.gz"), missing]);
    expect(sizeGb).toBe(1 / 1024 ** 2);
    expect(warnings).toEqual([`input file not found, counted as 0 bytes: ${missing}`]);
  });

  it("sizes both reads and lets overrides win field by field", async () => {
    const packages = new ResourcePackages(parseResourcesTsv("max_file_size\tcores\tmem\n0.000001\t1\t1000\ninf\t8\t64000\n"));
    const sample = toSample({
      sample_name: "s1",
      read1: path.join(tmpDir, "r1.fastq.gz"),
      read2: path.join(tmpDir, "r2.fastq.gz")
    });

    const sized = await selectCompute({ sample, packages, fallback: { cores: 2, mem: "2000" } });
    expect(sized.inputSizeGb).toBe(4 / 1024 ** 2);
    expect(sized.compute).toEqual({ cores: 8, mem: "64000" });
    expect(sized.warnings).toEqual([]);

    const partial = await selectCompute({ sample, packages, fallback: { cores: 2, mem: "2000" }, override: { cores: 3 } });
    expect(partial.compute).toEqual({ cores: 3, mem: "64000" });
  });

  it("skips sizing without a table or with a full override", async () => {
    const sample = toSample({ sample_name: "s1", read1: "/nonexistent/r1.fastq.gz" });
    const fallback = { cores: 2, mem: "2000", time: "01:00:00" };

    const noTable = await selectCompute({ sample, packages: null, fallback });
    expect(noTable).toEqual({ compute: fallback, inputSizeGb: null, warnings: [] });

    const packages = new ResourcePackages(parseResourcesTsv("max_file_size\tcores\tmem\ninf\t8\t64000\n"));
    const overridden = await selectCompute({ sample, packages, fallback, override: { cores: 16, mem: "90000" } });
    expect(overridden).toEqual({ compute: { cores: 16, mem: "90000", time: "01:00:00" }, inputSizeGb: null, warnings: [] });
  });
});
