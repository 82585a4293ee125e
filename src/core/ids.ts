import { ulid } from "ulid";
import { createHash } from "crypto";

export type SubmissionId = `sub_${string}`;
export type BatchId = `batch_${string}`;

const ULID_26 = /^[0-9A-HJKMNP-TV-Z]{26}$/;
const CROCKFORD = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";

/** 128 bits as 26 Crockford base32 digits, the same alphabet and width as a ulid. */
function toUlidAlphabet(bytes: Uint8Array): string {
  if (bytes.byteLength !== 16) throw new Error(`expected 16 bytes, got ${bytes.byteLength}`);
  let n = 0n;
  for (const b of bytes) n = (n << 8n) | BigInt(b);
  const digits: string[] = [];
  for (let i = 0; i < 26; i++) {
    digits.push(CROCKFORD.charAt(Number(n & 31n)));
    n >>= 5n;
  }
  return digits.reverse().join("");
}

export function newBatchId(): BatchId {
  return `batch_${ulid()}`;
}

export function deriveSubmissionIdFromParts(parts: string[]): SubmissionId {
  const h = createHash("sha256");
  for (const p of parts) h.update(p).update("|");
  const first16 = h.digest().subarray(0, 16);
  return `sub_${toUlidAlphabet(first16)}`;
}

export function isSubmissionId(value: string): value is SubmissionId {
  return value.startsWith("sub_") && ULID_26.test(value.slice(4));
}

export function isBatchId(value: string): value is BatchId {
  return value.startsWith("batch_") && ULID_26.test(value.slice(6));
}
