// Labor Law Assistant - Job tracker
// Tracks long-running ingestion work by id so HTTP callers can poll instead
// of waiting. Lifecycle: queued → processing → completed | failed.
//
// Work units run on an in-process runner (pending FIFO with a concurrency
// limit), never on the submitting call: submit() stores the record and
// returns before the unit starts. Finished records are pruned by age and
// count; queued and processing records are never pruned.

import { v4 as uuidv4 } from "uuid";
import type { SessionTracker } from "./session-tracker.js";
import { JobStatus, type Deferred, type JobRecord, type JobStatusView } from "./types.js";
import { createDeferred } from "./utils/deferred.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

export interface JobContext {
  jobId: string;
  /** Monitoring session opened for this unit; ended when it settles. */
  sessionId: string;
}

export type JobWork = (ctx: JobContext) => Promise<Record<string, unknown>>;

export interface JobParams {
  work: JobWork;
  collectionName?: string | null;
  filename?: string | null;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface JobTrackerDeps {
  tracker: SessionTracker;
  logger?: Logger;
  now?: () => Date;
}

export interface JobTrackerOptions {
  retentionMs?: number;
  maxRecords?: number;
  concurrency?: number;
}

export function toStatusView(job: Readonly<JobRecord>): JobStatusView {
  return {
    job_id: job.jobId,
    status: job.status,
    operation: job.operation,
    user: job.user,
    filename: job.filename,
    collection_name: job.collectionName,
    created_at: job.createdAt.toISOString(),
    started_at: job.startedAt?.toISOString() ?? null,
    completed_at: job.completedAt?.toISOString() ?? null,
    result: job.result,
    error: job.error,
  };
}

function isFinished(job: JobRecord): boolean {
  return job.status === JobStatus.COMPLETED || job.status === JobStatus.FAILED;
}

export class JobTracker {
  // Records are only rewritten inside synchronous sections, so a status
  // change is never observed half-applied.
  private readonly jobs: Map<string, JobRecord> = new Map();
  private readonly pending: Array<{ jobId: string; work: JobWork }> = [];
  private readonly running: Set<Promise<void>> = new Set();
  private idleWaiters: Array<Deferred<void>> = [];
  private pumpScheduled = false;
  private closed = false;

  private readonly tracker: SessionTracker;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly retentionMs: number;
  private readonly maxRecords: number;
  private readonly concurrency: number;

  constructor(deps: JobTrackerDeps, options: JobTrackerOptions = {}) {
    this.tracker = deps.tracker;
    this.logger = deps.logger ?? createLogger("JobTracker");
    this.now = deps.now ?? (() => new Date());
    this.retentionMs = options.retentionMs ?? 24 * 60 * 60 * 1000;
    this.maxRecords = options.maxRecords ?? 500;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
  }

  /**
   * Records a queued job and schedules its work. Returns immediately. After
   * close(), the job is recorded as failed without running.
   */
  submit(operation: string, user: string, params: JobParams): string {
    this.prune();

    const jobId = uuidv4();
    const job: JobRecord = {
      jobId,
      status: JobStatus.QUEUED,
      operation,
      user,
      collectionName: params.collectionName ?? null,
      filename: params.filename ?? null,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      result: null,
      error: null,
      sessionId: null,
    };
    this.jobs.set(jobId, job);

    if (this.closed) {
      job.status = JobStatus.FAILED;
      job.completedAt = this.now();
      job.error = "Job runner is shut down";
      this.logger.warn(`Job ${jobId} (${operation}) rejected: runner is shut down`);
      return jobId;
    }

    this.pending.push({ jobId, work: params.work });
    this.schedulePump();
    this.logger.info(`Job ${jobId} queued: ${operation} by ${user}`);
    return jobId;
  }

  /** Snapshot of one job, or undefined when the id is unknown or pruned. */
  get(jobId: string): Readonly<JobRecord> | undefined {
    const job = this.jobs.get(jobId);
    return job ? { ...job } : undefined;
  }

  /** Snapshots of every retained job, oldest first. */
  list(): Array<Readonly<JobRecord>> {
    return [...this.jobs.values()].map((job) => ({ ...job }));
  }

  /**
   * Drops finished records older than the retention window, then the oldest
   * finished records beyond the record cap. Returns how many were removed.
   */
  prune(): number {
    const cutoff = this.now().getTime() - this.retentionMs;
    let removed = 0;
    for (const [id, job] of this.jobs) {
      if (isFinished(job) && job.completedAt && job.completedAt.getTime() < cutoff) {
        this.jobs.delete(id);
        removed++;
      }
    }

    let excess = this.jobs.size - this.maxRecords;
    if (excess > 0) {
      const finished = [...this.jobs.values()]
        .filter(isFinished)
        .sort((a, b) => (a.completedAt?.getTime() ?? 0) - (b.completedAt?.getTime() ?? 0));
      for (const job of finished) {
        if (excess <= 0) break;
        this.jobs.delete(job.jobId);
        excess--;
        removed++;
      }
    }

    if (removed > 0) this.logger.debug(`Pruned ${removed} finished job records`);
    return removed;
  }

  stats(): { total: number } & Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = {
      [JobStatus.QUEUED]: 0,
      [JobStatus.PROCESSING]: 0,
      [JobStatus.COMPLETED]: 0,
      [JobStatus.FAILED]: 0,
    };
    for (const job of this.jobs.values()) {
      counts[job.status]++;
    }
    return { total: this.jobs.size, ...counts };
  }

  /** Resolves once nothing is pending or running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    const waiter = createDeferred<void>();
    this.idleWaiters.push(waiter);
    return waiter.promise;
  }

  /** Stops accepting work; queued and running units still finish. */
  close(): Promise<void> {
    this.closed = true;
    return this.whenIdle();
  }

  // ── Runner ─────────────────────────────────────────────────────────────────

  private isIdle(): boolean {
    return this.pending.length === 0 && this.running.size === 0 && !this.pumpScheduled;
  }

  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.running.size < this.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) break;
      const run: Promise<void> = this.execute(next.jobId, next.work).finally(() => {
        this.running.delete(run);
        this.pump();
      });
      this.running.add(run);
    }
    if (this.isIdle()) this.notifyIdle();
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  /** Runs one unit. Never rejects: every failure lands in the record. */
  private async execute(jobId: string, work: JobWork): Promise<void> {
    const job = this.jobs.get(jobId);
    if (!job) return;

    const sessionId = this.tracker.createSession(job.user);
    job.sessionId = sessionId;
    job.status = JobStatus.PROCESSING;
    job.startedAt = this.now();
    this.logger.info(`Job ${jobId} started: ${job.operation}`);

    try {
      const result = await work({ jobId, sessionId });
      job.result = result;
      job.completedAt = this.now();
      job.status = JobStatus.COMPLETED;
      this.logger.info(`Job ${jobId} completed`);
    } catch (err) {
      job.error = errorMessage(err);
      job.completedAt = this.now();
      job.status = JobStatus.FAILED;
      this.logger.error(`Job ${jobId} failed: ${job.error}`);
    } finally {
      this.tracker.endSession(sessionId);
    }
  }
}
