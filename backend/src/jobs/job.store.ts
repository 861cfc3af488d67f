import type { JobRecord, JobStatus } from "../../../shared/api.js";

const STATUS_ORDER: Record<JobStatus, number> = {
  queued: 0,
  processing: 1,
  extracting: 2,
  generating_questions: 3,
  completed: 4,
  error: 4,
};

export class JobStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobStateError";
  }
}

export function isTerminal(status: JobStatus): boolean {
  return status === "completed" || status === "error";
}

type StoredJob = {
  record: JobRecord;
  files: string[];
};

/**
 * Owns every job record. Callers get copies; all writes go through the
 * methods below, which only ever move a job forward.
 */
export class JobStore {
  private jobs = new Map<string, StoredJob>();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  create(id: string, files: string[]): JobRecord {
    if (this.jobs.has(id)) {
      throw new JobStateError(`Job ${id} already exists.`);
    }
    const timestamp = this.now();
    const record: JobRecord = {
      id,
      status: "queued",
      createdAt: timestamp,
      updatedAt: timestamp,
      resultFile: null,
      error: null,
    };
    this.jobs.set(id, { record, files: [...files] });
    return { ...record };
  }

  get(id: string): JobRecord | undefined {
    const stored = this.jobs.get(id);
    return stored ? { ...stored.record } : undefined;
  }

  list(): JobRecord[] {
    return [...this.jobs.values()].map((stored) => ({ ...stored.record }));
  }

  get size(): number {
    return this.jobs.size;
  }

  files(id: string): string[] {
    const stored = this.jobs.get(id);
    if (!stored) return [];
    const files = [...stored.files];
    if (stored.record.resultFile) files.push(stored.record.resultFile);
    return files;
  }

  transition(
    id: string,
    status: JobStatus,
    patch: { resultFile?: string; error?: string } = {}
  ): JobRecord {
    const stored = this.jobs.get(id);
    if (!stored) {
      throw new JobStateError(`Job ${id} not found.`);
    }
    const { record } = stored;
    if (isTerminal(record.status)) {
      throw new JobStateError(`Job ${id} is already ${record.status}.`);
    }
    if (STATUS_ORDER[status] < STATUS_ORDER[record.status]) {
      throw new JobStateError(`Job ${id} cannot move from ${record.status} to ${status}.`);
    }
    record.status = status;
    record.updatedAt = this.now();
    if (patch.resultFile !== undefined) record.resultFile = patch.resultFile;
    if (patch.error !== undefined) record.error = patch.error;
    return { ...record };
  }

  complete(id: string, resultFile: string): JobRecord {
    return this.transition(id, "completed", { resultFile });
  }

  fail(id: string, error: string): JobRecord {
    return this.transition(id, "error", { error });
  }

  delete(id: string): boolean {
    return this.jobs.delete(id);
  }
}
