// Labor Law Assistant - Express Server
// HTTP surface over the answering pipeline, ingestion jobs and the vector
// store. Every service is constructed once by the entry point and injected
// here; the server owns no state beyond the status cache.
//
// Authentication is handled upstream: the gateway forwards the verified user
// in the X-Authenticated-User header.

import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from "express";
import { createServer, type Server as HttpServer } from "node:http";
import type { AnswerPipeline } from "./answer-pipeline.js";
import type { SessionTracker } from "./session-tracker.js";
import type { IngestionService } from "./ingestion.js";
import type { VectorStore } from "./vector-store.js";
import type { ServiceHealth } from "./types.js";
import { toStatusView, type JobTracker } from "./job-tracker.js";
import { HealthCheckCache } from "./health-cache.js";
import { LoadLocalRequestSchema, QuestionRequestSchema, formatIssues } from "./schemas.js";
import { NotFoundError, ValidationError } from "./errors.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export const LOAD_LOCAL_OPERATION = "load_to_vectorstore_local";
export const USER_HEADER = "x-authenticated-user";
export const ANONYMOUS_USER = "anonymous";

// ─── Server Factory ─────────────────────────────────────────────────────────────

export type StatusProbe = () => ServiceHealth | Promise<ServiceHealth>;

/** Probes that must pass, and the status each must report, for the service to be ready. */
export const CRITICAL_PROBES: Readonly<Record<string, ServiceHealth["status"]>> = {
  qdrant: "connected",
  embedding_service: "healthy",
  rag_service: "healthy",
};

export interface AppServices {
  pipeline: AnswerPipeline;
  tracker: SessionTracker;
  jobs: JobTracker;
  ingestion: IngestionService;
  vectorStore: VectorStore;
  /** Named health probes reported by /api/status. */
  statusProbes?: Record<string, StatusProbe>;
}

export interface CreateServerOptions {
  services: AppServices;
  /** Custom logger. Defaults to console-based logger. */
  logger?: Logger;
  healthCacheTtlMs?: number;
  /** Reported by /api/health. */
  serviceName?: string;
  serviceVersion?: string;
  /** Millisecond clock for uptime and timestamps. Defaults to Date.now. */
  now?: () => number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Stop accepting connections and wait for open ones to finish. */
  close(): Promise<void>;
}

/** Express 4 does not forward async rejections; route them to the error handler. */
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function requestUser(req: Request): string {
  const header = req.get(USER_HEADER);
  return header && header.trim() ? header.trim() : ANONYMOUS_USER;
}

/** Runs every probe once, uncached; a throwing probe reports "error". */
async function probeStatuses(probes: Record<string, StatusProbe>, logger: Logger): Promise<Record<string, string>> {
  const entries = await Promise.all(
    Object.entries(probes).map(async ([name, probe]): Promise<[string, string]> => {
      try {
        const health = await probe();
        return [name, health.status];
      } catch (err) {
        logger.error(`Health probe ${name} failed: ${errorMessage(err)}`);
        return [name, "error"];
      }
    }),
  );
  return Object.fromEntries(entries);
}

function criticalProbesPass(statuses: Record<string, string>): boolean {
  return Object.entries(CRITICAL_PROBES).every(([name, expected]) => statuses[name] === expected);
}

/**
 * Creates the Express app and HTTP server.
 * Does not start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const {
    services,
    logger = createLogger("Server"),
    healthCacheTtlMs = 5000,
    serviceName = "labor-law-assistant",
    serviceVersion = "0.1.0",
    now = Date.now,
  } = options;
  const { pipeline, tracker, jobs, ingestion, vectorStore, statusProbes = {} } = services;
  const statusCache = new HealthCheckCache<ServiceHealth>(healthCacheTtlMs);
  const startedAt = now();

  const app = express();
  const httpServer = createServer(app);
  app.use(express.json({ limit: "1mb" }));

  // ── Health ─────────────────────────────────────────────────────────────────

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get(
    "/api/health",
    asyncHandler(async (_req, res) => {
      const dependencies = await probeStatuses(statusProbes, logger);
      const healthy = criticalProbesPass(dependencies);
      if (!healthy) logger.warn(`Health check degraded: ${JSON.stringify(dependencies)}`);
      res.json({
        success: healthy,
        message: healthy ? "Service is healthy" : "Service has issues",
        service: serviceName,
        version: serviceVersion,
        status: healthy ? "healthy" : "degraded",
        dependencies,
        uptime_seconds: (now() - startedAt) / 1000,
      });
    }),
  );

  app.get(
    "/api/health/ready",
    asyncHandler(async (_req, res) => {
      const ready = criticalProbesPass(await probeStatuses(statusProbes, logger));
      res.json({
        success: ready,
        message: ready ? "Service is ready" : "Service is not ready",
        ready,
        timestamp: new Date(now()).toISOString(),
      });
    }),
  );

  app.get(
    "/api/status",
    asyncHandler(async (_req, res) => {
      const entries = await Promise.all(
        Object.entries(statusProbes).map(async ([name, probe]): Promise<[string, ServiceHealth]> => {
          try {
            return [name, await statusCache.getOrCompute(name, async () => probe())];
          } catch (err) {
            return [name, { status: "unhealthy", error: errorMessage(err) }];
          }
        }),
      );
      res.json({
        success: true,
        message: "Service status retrieved successfully",
        services: Object.fromEntries(entries),
        sessions: tracker.stats(),
        jobs: jobs.stats(),
      });
    }),
  );

  // ── RAG ────────────────────────────────────────────────────────────────────

  app.post(
    "/api/rag/ask",
    asyncHandler(async (req, res) => {
      const parsed = QuestionRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(422).json({
          success: false,
          message: "Invalid request",
          error_code: "VALIDATION_ERROR",
          details: formatIssues(parsed.error),
        });
        return;
      }

      const { question } = parsed.data;
      logger.info(`Received question: ${question.slice(0, 100)}`);
      const sessionId = tracker.createSession(requestUser(req));
      try {
        const result = await pipeline.answer(question, sessionId);
        if (!result.success) {
          logger.error(`Failed to answer question: ${result.error ?? "unknown error"}`);
        }
        res.json({
          ...result,
          message: result.success ? "Question answered successfully" : "Failed to answer question",
        });
      } finally {
        tracker.endSession(sessionId);
      }
    }),
  );

  // ── Ingestion jobs ─────────────────────────────────────────────────────────

  app.post("/api/data/load-to-vectorstore-local", (req, res) => {
    const parsed = LoadLocalRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json({
        success: false,
        message: "Invalid request",
        error_code: "VALIDATION_ERROR",
        details: formatIssues(parsed.error),
      });
      return;
    }

    const body = parsed.data;
    const jobId = jobs.submit(LOAD_LOCAL_OPERATION, requestUser(req), {
      collectionName: ingestion.targetCollection,
      filename: body.filename,
      work: ({ sessionId }) =>
        ingestion.loadFromLocalFile(
          {
            filename: body.filename,
            dataPath: body.local_data_path,
            replaceCollection: body.replace_collection,
            batchSize: body.batch_size,
          },
          sessionId,
        ),
    });

    res.status(202).json({
      success: true,
      message: "Load job accepted",
      job_id: jobId,
      job_status_url: `/api/data/jobs/${jobId}`,
    });
  });

  app.get("/api/data/jobs", (_req, res) => {
    const list = jobs.list().map(toStatusView);
    res.json({ success: true, jobs: list, count: list.length });
  });

  app.get("/api/data/jobs/:jobId", (req, res, next) => {
    const job = jobs.get(req.params.jobId);
    if (!job) {
      next(new NotFoundError(`Job '${req.params.jobId}' not found`));
      return;
    }
    res.json({ success: true, message: "Job status retrieved successfully", ...toStatusView(job) });
  });

  // ── Collections ────────────────────────────────────────────────────────────

  app.get(
    "/api/data/collections",
    asyncHandler(async (_req, res) => {
      const collections = await vectorStore.listCollections();
      res.json({
        success: true,
        message: "Collections retrieved successfully",
        collections,
        count: collections.length,
      });
    }),
  );

  app.get(
    "/api/data/collections/:name",
    asyncHandler(async (req, res) => {
      const info = await vectorStore.getCollectionInfo(req.params.name);
      if (!info) throw new NotFoundError(`Collection '${req.params.name}' not found`);
      res.json({
        success: true,
        message: "Collection information retrieved successfully",
        collection_name: info.name,
        points_count: info.pointsCount,
        vector_size: info.vectorSize,
        distance_metric: info.distanceMetric,
        indexed_vectors_count: info.indexedVectorsCount,
        status: info.status,
      });
    }),
  );

  app.delete(
    "/api/data/collections/:name",
    asyncHandler(async (req, res) => {
      const deleted = await vectorStore.deleteCollection(req.params.name);
      if (!deleted) throw new NotFoundError(`Collection '${req.params.name}' not found`);
      res.json({ success: true, message: `Collection '${req.params.name}' deleted successfully` });
    }),
  );

  // ── Errors ─────────────────────────────────────────────────────────────────

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (err instanceof NotFoundError) {
      res.status(404).json({ success: false, message: err.message, error_code: "NOT_FOUND" });
      return;
    }
    if (err instanceof ValidationError) {
      res.status(422).json({ success: false, message: err.message, error_code: "VALIDATION_ERROR" });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ success: false, message: "Malformed JSON body", error_code: "INVALID_JSON" });
      return;
    }
    logger.error(`Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`);
    res.status(500).json({ success: false, message: "Internal server error", error_code: "INTERNAL_ERROR" });
  };
  app.use(errorHandler);

  return {
    app,
    httpServer,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        if (!httpServer.listening) {
          resolve();
          return;
        }
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
