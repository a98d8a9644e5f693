import { createHash } from "node:crypto";

export function computeSourceChecksum(records: readonly unknown[]): string {
  return createHash("sha256").update(JSON.stringify(records)).digest("hex");
}
