import { randomBytes } from "node:crypto";

/** `newsarchive-20240102T030405Z-1a2b3c`: sortable by start time, unique per process. */
export function createRunId(now = new Date(), entropy: Buffer = randomBytes(3)): string {
  const stamp = now.toISOString().replace(/\.\d{3}/, "").replace(/[-:]/g, "");
  return `newsarchive-${stamp}-${entropy.toString("hex")}`;
}
