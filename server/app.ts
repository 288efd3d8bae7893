import cors from "cors";
import express from "express";
import { z } from "zod";
import type { PipelineStores } from "./domain/store.js";
import { SITE_STATUSES, SUBMISSION_STATUSES } from "./domain/types.js";
import { buildReport, manualAssistQueue } from "./services/report.js";

type AsyncHandler = (req: express.Request, res: express.Response, next: express.NextFunction) => Promise<void>;
function asyncHandler(fn: AsyncHandler): express.RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

const directoryQuerySchema = z.object({
  siteStatus: z.enum(SITE_STATUSES).optional()
});

const planQuerySchema = z.object({
  status: z.enum(SUBMISSION_STATUSES).optional()
});

/** Read-only view of the stores for the reporting layer and the manual-submission assistant. */
export function createApp(stores: PipelineStores): express.Express {
  const app = express();

  app.use(
    cors({
      origin: process.env.CORS_ORIGIN ? process.env.CORS_ORIGIN.split(",").map((value) => value.trim()) : true
    })
  );

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "dirsubmit", store: stores.documents.kind });
  });

  app.get(
    "/api/summary",
    asyncHandler(async (_req, res) => {
      const [records, plan] = await Promise.all([stores.directories.load(), stores.plan.load()]);
      res.json(buildReport(records, plan));
    })
  );

  app.get(
    "/api/manual-queue",
    asyncHandler(async (_req, res) => {
      const [records, plan] = await Promise.all([stores.directories.load(), stores.plan.load()]);
      res.json(manualAssistQueue(plan, records));
    })
  );

  app.get(
    "/api/directories",
    asyncHandler(async (req, res) => {
      const parsed = directoryQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      const records = await stores.directories.load();
      const { siteStatus } = parsed.data;
      res.json(siteStatus ? records.filter((record) => record.siteStatus === siteStatus) : records);
    })
  );

  app.get(
    "/api/plan",
    asyncHandler(async (req, res) => {
      const parsed = planQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ message: parsed.error.flatten() });
        return;
      }
      const plan = await stores.plan.load();
      const { status } = parsed.data;
      res.json(status ? plan.filter((target) => target.status === status) : plan);
    })
  );

  app.use((error: Error & { status?: number }, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error("Unhandled error:", error.message);
    res.status(error.status ?? 500).json({ message: error.message || "Internal server error" });
  });

  return app;
}
