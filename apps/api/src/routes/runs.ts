import type { NextFunction, Request, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import { ArtifactUnreadable } from "../errors";
import type { RunRegistry, RunSession } from "../services/runs";
import { eventFromRecord } from "../trace/events";
import { EvidenceItemSchema } from "../types/supervision";

const CreateRunSchema = z.object({
  evidence: z.array(EvidenceItemSchema).default([])
});

const EventRecordSchema = z.object({ type: z.string() }).passthrough();
const EventsBodySchema = z.union([EventRecordSchema, z.array(EventRecordSchema).min(1)]);

const ArtifactBodySchema = z.object({
  path: z.string().min(1),
  name: z.string().min(1).optional()
});

const EvidenceBodySchema = z.object({
  items: z.array(EvidenceItemSchema).min(1)
});

type Handler = (req: Request, res: Response, session: RunSession) => Promise<void> | void;

function badRequest(res: Response, error: z.ZodError) {
  res.status(400).json({ error: "Invalid request body", issues: error.issues });
}

/**
 * Routes for agent loops running in another process. Each request maps to
 * one hook operation; a run is driven by one caller at a time.
 */
export function runsRouter(registry: RunRegistry): Router {
  const router = Router();

  const withRun =
    (handler: Handler) =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const session = registry.get(req.params.id);

      if (!session) {
        res.status(404).json({ error: "Run not found" });
        return;
      }

      try {
        await handler(req, res, session);
      } catch (err) {
        next(err);
      }
    };

  router.post("/", (req, res) => {
    const body = CreateRunSchema.safeParse(req.body ?? {});
    if (!body.success) return badRequest(res, body.error);

    const session = registry.create({ evidence: body.data.evidence });
    res.status(201).json({ runId: session.runId });
  });

  router.get(
    "/:id",
    withRun((_req, res, session) => {
      res.json(session.hook.getSummary());
    })
  );

  router.post(
    "/:id/events",
    withRun((req, res, session) => {
      const body = EventsBodySchema.safeParse(req.body);
      if (!body.success) return badRequest(res, body.error);

      const records = Array.isArray(body.data) ? body.data : [body.data];
      for (const record of records) session.store.append(eventFromRecord(record, session.clock));
      res.status(202).json({ appended: records.length });
    })
  );

  router.post(
    "/:id/evidence",
    withRun(async (req, res, session) => {
      const body = EvidenceBodySchema.safeParse(req.body);
      if (!body.success) return badRequest(res, body.error);

      session.evidence.add(...body.data.items);
      await session.hook.bindEvidenceNow();
      res.status(202).json({ added: body.data.items.length });
    })
  );

  router.post(
    "/:id/artifacts",
    withRun(async (req, res, session) => {
      const body = ArtifactBodySchema.safeParse(req.body);
      if (!body.success) return badRequest(res, body.error);

      try {
        await session.hook.onArtifactCreated(body.data.path, body.data.name);
      } catch (err) {
        if (err instanceof ArtifactUnreadable) {
          res.status(422).json({ error: err.message, code: err.code });
          return;
        }
        throw err;
      }
      res.status(204).end();
    })
  );

  router.post(
    "/:id/step",
    withRun(async (_req, res, session) => {
      const intervention = await session.hook.onStep();
      res.json({ intervention });
    })
  );

  router.delete(
    "/:id",
    withRun((_req, res, session) => {
      registry.close(session.runId);
      res.status(204).end();
    })
  );

  return router;
}
