/**
 * Run identifiers.
 *
 * A CLI creates one id when it starts and hands it to every logger it
 * builds, so all lines written by one batch share it. Format is
 * `YYYYMMDD-xxxxxx`: the UTC date followed by six hex digits.
 */

import { randomBytes } from "node:crypto";

export function createRunId(now: Date = new Date()): string {
  const day = now.toISOString().slice(0, 10).replace(/-/g, "");
  return `${day}-${randomBytes(3).toString("hex")}`;
}
