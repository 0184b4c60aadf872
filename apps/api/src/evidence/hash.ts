import crypto from "node:crypto";

export function hashParts(parts: Array<string | number>, length = 12): string {
  return crypto.createHash("sha256").update(parts.join("\u0000")).digest("hex").slice(0, length);
}
