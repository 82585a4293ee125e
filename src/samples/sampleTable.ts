import { parseDelimitedRecords } from "../core/delimited.js";

export class SampleTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SampleTableError";
  }
}

export interface SampleRow {
  /** 1-based record number; the header is record 1. Comments and blank lines are not counted. */
  record: number;
  attributes: Record<string, string>;
}

/**
 * Parses a PEP sample table (CSV with a header row). Empty cells are left out
 * of the row so that the attribute counts as absent.
 */
export function parseSampleTable(content: string): SampleRow[] {
  const records = parseDelimitedRecords(content, ",", (message) => new SampleTableError(message));

  const columns = records.shift();
  if (!columns) throw new SampleTableError("sample table is empty");
  if (!columns.includes("sample_name")) throw new SampleTableError("missing required column: sample_name");
  const seenColumns = new Set<string>();
  for (const c of columns) {
    if (!c) throw new SampleTableError("record 1: empty column name");
    if (seenColumns.has(c)) throw new SampleTableError(`record 1: duplicate column: ${c}`);
    seenColumns.add(c);
  }

  const seenNames = new Set<string>();
  return records.map((cells, idx) => {
    const record = idx + 2;
    if (cells.length > columns.length) {
      throw new SampleTableError(`record ${record}: expected ${columns.length} cells, got ${cells.length}`);
    }
    const attributes: Record<string, string> = {};
    columns.forEach((column, i) => {
      const value = cells[i] ?? "";
      if (value.length > 0) attributes[column] = value;
    });

    const name = attributes["sample_name"];
    if (!name) throw new SampleTableError(`record ${record}: sample_name is empty`);
    if (seenNames.has(name)) throw new SampleTableError(`record ${record}: duplicate sample_name: ${name}`);
    seenNames.add(name);

    return { record, attributes };
  });
}
