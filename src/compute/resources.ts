import { promises as fs } from "fs";
import { parseDelimitedRecords } from "../core/delimited.js";

export interface ComputeConfig {
  cores: number;
  /** Memory in megabytes, as the scheduler expects it. */
  mem: string;
  time?: string;
}

export interface ResourcePackage extends ComputeConfig {
  /** Upper bound on total input size in GiB; Infinity for the catch-all row. */
  maxFileSizeGb: number;
}

export class ResourcePackageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourcePackageError";
  }
}

const GIB = 1024 ** 3;
const UNBOUNDED = new Set(["", "nan", "inf", "infinity"]);
const REQUIRED_COLUMNS = ["max_file_size", "cores", "mem"] as const;

function parseMaxFileSize(raw: string, record: number): number {
  if (UNBOUNDED.has(raw.toLowerCase())) return Number.POSITIVE_INFINITY;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) throw new ResourcePackageError(`record ${record}: invalid max_file_size: ${raw}`);
  return n;
}

function parseCores(raw: string, record: number): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) throw new ResourcePackageError(`record ${record}: cores must be an integer >= 1 (got ${raw})`);
  return n;
}

export function parseResourcesTsv(text: string): ResourcePackage[] {
  const records = parseDelimitedRecords(text, "\t", (message) => new ResourcePackageError(message));

  const columns = records.shift();
  if (!columns) throw new ResourcePackageError("resources table is empty");
  for (const required of REQUIRED_COLUMNS) {
    if (!columns.includes(required)) throw new ResourcePackageError(`missing column: ${required}`);
  }
  const col = (cells: string[], name: string): string => {
    const idx = columns.indexOf(name);
    return idx < 0 ? "" : (cells[idx] ?? "");
  };

  const packages = records.map((cells, idx) => {
    const record = idx + 2;
    const mem = col(cells, "mem");
    if (!/^[0-9]+$/.test(mem)) throw new ResourcePackageError(`record ${record}: mem must be an integer number of MB (got ${mem})`);
    const time = col(cells, "time");
    const pkg: ResourcePackage = {
      maxFileSizeGb: parseMaxFileSize(col(cells, "max_file_size"), record),
      cores: parseCores(col(cells, "cores"), record),
      mem
    };
    if (time) pkg.time = time;
    return pkg;
  });

  if (packages.length === 0) throw new ResourcePackageError("resources table has no packages");
  return packages.sort((a, b) => a.maxFileSizeGb - b.maxFileSizeGb);
}

export class ResourcePackages {
  constructor(private readonly packages: readonly ResourcePackage[]) {
    if (packages.length === 0) throw new ResourcePackageError("at least one resource package is required");
  }

  static async loadFromFile(filePath: string): Promise<ResourcePackages> {
    const text = await fs.readFile(filePath, "utf8");
    try {
      return new ResourcePackages(parseResourcesTsv(text));
    } catch (err) {
      if (err instanceof ResourcePackageError) {
        throw new ResourcePackageError(`${filePath}: ${err.message}`);
      }
      throw err;
    }
  }

  list(): readonly ResourcePackage[] {
    return this.packages;
  }

  /** Smallest package that fits the input; inputs beyond every bound get the largest one. */
  select(inputSizeGb: number): ComputeConfig {
    const fit = this.packages.find((p) => inputSizeGb <= p.maxFileSizeGb) ?? this.packages[this.packages.length - 1];
    if (!fit) throw new ResourcePackageError("no resource packages");
    const compute: ComputeConfig = { cores: fit.cores, mem: fit.mem };
    if (fit.time !== undefined) compute.time = fit.time;
    return compute;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function measureInputSizeGb(paths: readonly string[]): Promise<{ sizeGb: number; warnings: string[] }> {
  let bytes = 0;
  const warnings: string[] = [];
  for (const p of paths) {
    try {
      const st = await fs.stat(p);
      bytes += st.size;
    } catch (err) {
      if (!isNotFound(err)) throw err;
      warnings.push(`input file not found, counted as 0 bytes: ${p}`);
    }
  }
  return { sizeGb: bytes / GIB, warnings };
}
