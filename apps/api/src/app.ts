import express from "express";
import cors from "cors";
import { ZodError } from "zod";
import { SupervisorError } from "./errors";
import { runsRouter } from "./routes/runs";
import { env } from "./services/env";
import { createLogger, type Logger } from "./services/logger";
import { createRateLimiter, type RateLimiter } from "./services/rateLimit";
import type { RunRegistry } from "./services/runs";

export type AppOptions = {
  registry: RunRegistry;
  corsOrigin?: string;
  rateLimiter?: RateLimiter;
  logger?: Logger;
};

/**
 * Express API service:
 * - CORS locked to the configured origin
 * - Rate limiting per IP on /api
 * - Supervision runs under /api/runs
 */
export function createApp(opts: AppOptions) {
  const app = express();
  const log = opts.logger ?? createLogger("api");
  const checkRateLimit = opts.rateLimiter ?? createRateLimiter();

  app.use(
    cors({
      origin: opts.corsOrigin ?? env.CORS_ORIGIN,
      credentials: false
    })
  );

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use("/api", async (req, res, next) => {
    const ip =
      req.headers["x-forwarded-for"]?.toString().split(",")[0]?.trim() ||
      req.socket.remoteAddress ||
      "unknown";

    try {
      const r = await checkRateLimit(ip);
      res.setHeader("X-RateLimit-Remaining", String(r.remaining));

      if (!r.allowed) {
        res.status(429).json({ error: "Rate limit exceeded" });
        return;
      }
    } catch (err) {
      next(err);
      return;
    }

    next();
  });

  app.use("/api/runs", runsRouter(opts.registry));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (res.headersSent) {
      log.error({ err }, "unhandled error after headers sent");
      return;
    }

    // Malformed JSON bodies surface from express.json() as 400s.
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json({ error: "Invalid request body", issues: err.issues });
      return;
    }

    log.error({ err }, "request failed");
    const message = err instanceof Error ? err.message : "Unknown error";
    res.status(500).json({
      error: message,
      ...(err instanceof SupervisorError ? { code: err.code } : {})
    });
  });

  return app;
}
