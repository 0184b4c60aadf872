import { Redis } from "@upstash/redis";
import type { z } from "zod";
import { env } from "./env";
import { createLogger } from "./logger";

/**
 * Read-through JSON cache for fetched evidence bundles.
 * - Upstash Redis when configured (shared across API instances).
 * - In-memory fallback otherwise.
 *
 * Entries are validated against the caller's schema on the way out; a stale
 * or malformed entry counts as a miss and is reloaded.
 */
const redis =
  env.UPSTASH_REDIS_REST_URL && env.UPSTASH_REDIS_REST_TOKEN
    ? new Redis({
        url: env.UPSTASH_REDIS_REST_URL,
        token: env.UPSTASH_REDIS_REST_TOKEN,
        automaticDeserialization: false
      })
    : null;

const log = createLogger("cache");

type MemEntry = { raw: string; expiresAt: number };
const mem = new Map<string, MemEntry>();

export function cacheKey(namespace: string, ...parts: string[]): string {
  return [namespace, ...parts.map((p) => p.trim().toLowerCase())].join(":");
}

async function readRaw(key: string): Promise<string | null> {
  if (redis) return (await redis.get<string>(key)) ?? null;

  const hit = mem.get(key);
  if (!hit) return null;
  if (Date.now() > hit.expiresAt) {
    mem.delete(key);
    return null;
  }
  return hit.raw;
}

async function writeRaw(key: string, raw: string, ttlSeconds: number): Promise<void> {
  if (redis) {
    await redis.set(key, raw, { ex: ttlSeconds });
    return;
  }
  mem.set(key, { raw, expiresAt: Date.now() + ttlSeconds * 1000 });
}

function decode<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export async function cachedJson<T>(
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ttlSeconds: number,
  load: () => Promise<T>
): Promise<T> {
  const raw = await readRaw(key);
  if (raw !== null) {
    const hit = decode(raw, schema);
    if (hit !== null) return hit;
    log.debug({ key }, "discarding cache entry that failed validation");
  }

  const value = await load();
  await writeRaw(key, JSON.stringify(value), ttlSeconds);
  return value;
}

export function cacheClear(): void {
  mem.clear();
}
