import { parse } from "csv-parse/sync";
import * as z from "zod/v4";

const zRecords = z.array(z.array(z.string()));

/** Reads delimited text into trimmed string records; `#` starts a comment and blank lines are skipped. */
export function parseDelimitedRecords(content: string, delimiter: string, onError: (message: string) => Error): string[][] {
  let raw: unknown;
  try {
    raw = parse(content, {
      delimiter,
      comment: "#",
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (err) {
    throw onError(`invalid table: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = zRecords.safeParse(raw);
  if (!parsed.success) throw onError("invalid table: expected rows of text cells");
  return parsed.data.map((cells) => cells.map((c) => c.trim()));
}
