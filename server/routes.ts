import type { Express } from "express";
import { createServer, type Server } from "http";
import { exportFormatSchema } from "@shared/schema";
import type { IStorage } from "./storage";
import type { SchedulerService } from "./services/scheduler";
import { Logger } from "./services/logger";
import { errorMessage } from "./services/errors";
import { exportRecords, toExportRow } from "./services/exporter";

export interface RouteDependencies {
  storage: IStorage;
  scheduler: SchedulerService;
  dataDir: string;
}

function parseLimit(value: unknown, fallback: number): number {
  const parsed = typeof value === "string" ? parseInt(value, 10) : NaN;
  return Number.isFinite(parsed) && parsed > 0 ? Math.min(parsed, 500) : fallback;
}

export function registerRoutes(app: Express, { storage, scheduler, dataDir }: RouteDependencies): Server {
  // Scheduler state
  app.get("/api/status", async (req, res) => {
    try {
      const latest = await storage.getLatestPipelineRun();
      res.json({
        state: scheduler.getState(),
        cron: scheduler.cronExpression,
        casesStored: await storage.getCasesCount(),
        latestRun: latest ?? null,
      });
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch status" });
    }
  });

  app.get("/api/runs", async (req, res) => {
    try {
      const runs = await storage.getRecentPipelineRuns(parseLimit(req.query.limit, 10));
      res.json(runs);
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch pipeline runs" });
    }
  });

  app.get("/api/runs/latest", async (req, res) => {
    try {
      const latest = await storage.getLatestPipelineRun();
      if (!latest) {
        return res.status(404).json({ error: "No runs yet" });
      }
      res.json(latest);
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch latest run" });
    }
  });

  // Manual trigger
  app.post("/api/runs/trigger", async (req, res) => {
    try {
      if (scheduler.isRunning()) {
        return res.status(409).json({ error: "A run is already in progress" });
      }

      // Runs in the background; progress is visible through /api/runs
      scheduler.trigger("manual").catch(async error => {
        await Logger.error(`Manual run failed: ${errorMessage(error)}`, "api");
      });

      res.status(202).json({ message: "Run started" });
    } catch (error) {
      res.status(500).json({ error: "Failed to trigger run" });
    }
  });

  app.post("/api/runs/stop", async (req, res) => {
    try {
      // The run ends after its current page; progress is visible through /api/runs
      const requested = scheduler.requestStop();
      if (requested) {
        await Logger.info("Stop requested through the API", "api");
      }
      res.json({ message: requested ? "Stop requested" : "No run in progress" });
    } catch (error) {
      res.status(500).json({ error: "Failed to stop" });
    }
  });

  // Structured snapshot for the viewer
  app.get("/api/cases", async (req, res) => {
    try {
      const cases = await storage.getAllCases();
      res.json(cases.map(toExportRow));
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch cases" });
    }
  });

  app.get("/api/conflicts", async (req, res) => {
    try {
      const runId = typeof req.query.runId === "string" ? req.query.runId : undefined;
      const conflicts = runId
        ? await storage.getConflictsForRun(runId)
        : await storage.getRecentConflicts(parseLimit(req.query.limit, 50));
      res.json(conflicts);
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch conflicts" });
    }
  });

  app.get("/api/export/:format", async (req, res) => {
    const format = exportFormatSchema.safeParse(req.params.format);
    if (!format.success) {
      return res.status(400).json({ error: "Format must be one of csv, xlsx, json" });
    }

    try {
      const result = await exportRecords(storage, format.data, dataDir);
      res.download(result.path);
    } catch (error) {
      await Logger.error(`Export failed: ${errorMessage(error)}`, "api");
      res.status(500).json({ error: "Failed to export cases" });
    }
  });

  // System logs
  app.get("/api/logs", async (req, res) => {
    try {
      const logs = await storage.getRecentSystemLogs(parseLimit(req.query.limit, 100));
      res.json(logs);
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch logs" });
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
