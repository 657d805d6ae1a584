import { JobTrackingError } from "../errors.js";

export interface TrackedJob {
  jobId: string;
  operationHandle: string;
  /** Session the operation was created in; operations do not survive their session. */
  sessionHandle: string;
  /** Token the next un-addressed fetch reads from. */
  nextToken: number;
  trackedAt: string;
}

export interface TrackJobParams {
  operationHandle: string;
  sessionHandle: string;
  nextToken?: number;
}

/**
 * Job id → operation handle bookkeeping for jobs left running on purpose.
 * Every method is synchronous, so each mutation completes before another
 * tool invocation can observe the map.
 */
export class JobTracker {
  private readonly jobs = new Map<string, TrackedJob>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  track(jobId: string, params: TrackJobParams): TrackedJob {
    const existing = this.jobs.get(jobId);
    if (existing) {
      throw new JobTrackingError(
        "job_already_tracked",
        jobId,
        `Job ${jobId} is already tracked; the gateway reported the same job id for two running statements`
      );
    }
    const entry: TrackedJob = {
      jobId,
      operationHandle: params.operationHandle,
      sessionHandle: params.sessionHandle,
      nextToken: params.nextToken ?? 0,
      trackedAt: this.now().toISOString()
    };
    this.jobs.set(jobId, entry);
    return { ...entry };
  }

  lookup(jobId: string): TrackedJob {
    const entry = this.jobs.get(jobId);
    if (!entry) {
      throw new JobTrackingError("job_not_tracked", jobId, `Job ${jobId} is not tracked by this server`);
    }
    return { ...entry };
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  untrack(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  /** Moves the read cursor forward; an older token never rewinds it. */
  advance(jobId: string, nextToken: number): void {
    const entry = this.jobs.get(jobId);
    if (!entry || nextToken <= entry.nextToken) {
      return;
    }
    this.jobs.set(jobId, { ...entry, nextToken });
  }

  list(): TrackedJob[] {
    return [...this.jobs.values()].map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.jobs.size;
  }
}
