import { randomUUID } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { JobRecord, QuestionCounts } from "../../../shared/api.js";
import { REFERENCE_MAX_PAGES, SYLLABUS_MAX_PAGES } from "../config/extraction.config.js";
import { extractText, type ExtractedDocument } from "../services/pdf-text.service.js";
import type {
  GenerationBackend,
  GenerationResult,
  QuestionGenerator,
} from "../services/question-generation.service.js";
import {
  countQuestions,
  parseQuestionResponse,
  type ParsedQuestions,
} from "../services/response-parser.service.js";
import { exportWorkbook } from "../services/workbook-export.service.js";
import { JobQueue } from "./job.queue.js";
import { isTerminal, JobStore } from "./job.store.js";

export const JOB_MESSAGES = {
  referenceEmpty: "No text could be extracted from the reference PDF.",
  syllabusEmpty: "No text could be extracted from the syllabus PDF.",
  quota: "API quota exceeded. Please add credits to your account and try again.",
  timeout: "Question generation timed out. Please try again later.",
  exportFailed: "Failed to create the question workbook.",
  shutdown: "Server shut down before the job started.",
} as const;

export interface UploadedDocument {
  originalName: string;
  data: Buffer;
}

export interface SubmitJobInput {
  reference: UploadedDocument;
  syllabus: UploadedDocument;
  counts: QuestionCounts;
  customInstructions: string;
}

export type SubmitResult = { ok: true; job: JobRecord } | { ok: false; reason: "queue_full" };

export type DocumentExtractor = (filePath: string, maxPages: number) => Promise<ExtractedDocument>;

export type WorkbookWriter = (parsed: ParsedQuestions, outputFile: string) => Promise<boolean>;

export interface JobOrchestratorOptions {
  uploadDir: string;
  generatedDir: string;
  backend: GenerationBackend;
  maxConcurrentJobs: number;
  maxQueuedJobs: number;
  jobTtlMs: number;
  extract?: DocumentExtractor;
  writeWorkbook?: WorkbookWriter;
  store?: JobStore;
}

type PipelineInput = {
  id: string;
  referencePath: string;
  syllabusPath: string;
  counts: QuestionCounts;
  customInstructions: string;
};

export function describeGenerationFailure(result: Extract<GenerationResult, { success: false }>): string {
  if (result.errorKind === "timeout") {
    return JOB_MESSAGES.timeout;
  }
  if (result.error.includes("429") || result.error.toLowerCase().includes("quota")) {
    return JOB_MESSAGES.quota;
  }
  return `Failed to generate questions: ${result.error}`;
}

export class JobOrchestrator {
  readonly store: JobStore;
  private queue: JobQueue;
  private uploadDir: string;
  private generatedDir: string;
  private backend: GenerationBackend;
  private jobTtlMs: number;
  private extract: DocumentExtractor;
  private writeWorkbook: WorkbookWriter;
  private inFlight = new Map<string, Promise<void>>();
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: JobOrchestratorOptions) {
    this.store = options.store ?? new JobStore();
    this.queue = new JobQueue(options.maxConcurrentJobs, options.maxQueuedJobs);
    this.uploadDir = options.uploadDir;
    this.generatedDir = options.generatedDir;
    this.backend = options.backend;
    this.jobTtlMs = options.jobTtlMs;
    this.extract = options.extract ?? ((filePath, maxPages) => extractText(filePath, { maxPages }));
    this.writeWorkbook = options.writeWorkbook ?? exportWorkbook;
  }

  get generationState(): GenerationBackend["state"] {
    return this.backend.state;
  }

  async init(): Promise<void> {
    await mkdir(this.uploadDir, { recursive: true });
    await mkdir(this.generatedDir, { recursive: true });
  }

  async submit(input: SubmitJobInput): Promise<SubmitResult> {
    if (!this.queue.hasCapacity()) {
      console.warn("[jobs] Queue full, rejecting submission");
      return { ok: false, reason: "queue_full" };
    }

    const id = randomUUID();
    const referencePath = path.join(this.uploadDir, `${id}_reference.pdf`);
    const syllabusPath = path.join(this.uploadDir, `${id}_syllabus.pdf`);
    await mkdir(this.uploadDir, { recursive: true });
    try {
      await writeFile(referencePath, input.reference.data);
      await writeFile(syllabusPath, input.syllabus.data);
    } catch (err) {
      await this.removeFiles([referencePath, syllabusPath]);
      throw err;
    }

    if (!this.queue.hasCapacity()) {
      await this.removeFiles([referencePath, syllabusPath]);
      console.warn("[jobs] Queue filled during upload, rejecting submission");
      return { ok: false, reason: "queue_full" };
    }

    const job = this.store.create(id, [referencePath, syllabusPath]);
    console.log(
      `[jobs] ${id} queued (reference=${input.reference.originalName}, syllabus=${input.syllabus.originalName})`
    );

    if (this.backend.state === "unavailable") {
      const failed = this.store.fail(
        id,
        `Question generation service is not available: ${this.backend.reason}`
      );
      return { ok: true, job: failed };
    }

    const client = this.backend.client;
    const pipeline: PipelineInput = {
      id,
      referencePath,
      syllabusPath,
      counts: input.counts,
      customInstructions: input.customInstructions,
    };
    const settled = this.queue.enqueue(() => this.runJob(pipeline, client));
    if (!settled) {
      return { ok: true, job: this.store.fail(id, "Job queue is full.") };
    }
    this.inFlight.set(id, settled);
    void settled.then(() => {
      this.inFlight.delete(id);
    });
    return { ok: true, job };
  }

  getJob(id: string): JobRecord | undefined {
    return this.store.get(id);
  }

  /** Resolves once the job's worker has finished or was dropped. */
  settled(id: string): Promise<JobRecord | undefined> {
    const running = this.inFlight.get(id) ?? Promise.resolve();
    return running.then(() => this.store.get(id));
  }

  async evictExpired(now = Date.now()): Promise<number> {
    if (this.jobTtlMs <= 0) return 0;
    let evicted = 0;
    for (const job of this.store.list()) {
      if (!isTerminal(job.status) || now - job.updatedAt < this.jobTtlMs) continue;
      const leftover = await this.removeFiles(this.store.files(job.id));
      if (leftover > 0) {
        console.warn(`[jobs] ${job.id} kept for the next sweep, ${leftover} file(s) could not be removed`);
        continue;
      }
      this.store.delete(job.id);
      evicted += 1;
      console.log(`[jobs] ${job.id} evicted (${job.status})`);
    }
    return evicted;
  }

  startEvictionSweep(intervalMs: number): void {
    if (this.sweepTimer || this.jobTtlMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.evictExpired().catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[jobs] Eviction sweep failed: ${message}`);
      });
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stopEvictionSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Returns the number of running jobs abandoned after the grace period. */
  async shutdown(graceMs: number): Promise<number> {
    this.stopEvictionSweep();
    const dropped = this.queue.clearPending();
    if (dropped > 0) {
      for (const job of this.store.list()) {
        if (job.status === "queued") this.store.fail(job.id, JOB_MESSAGES.shutdown);
      }
    }
    if (this.queue.running > 0) {
      console.log(`[jobs] Waiting for ${this.queue.running} running job(s) to finish...`);
    }
    const abandoned = await this.queue.drain(graceMs);
    if (abandoned > 0) {
      console.warn(`[jobs] Abandoning ${abandoned} running job(s)`);
    }
    return abandoned;
  }

  /** Returns how many of the files are still on disk. */
  private async removeFiles(files: string[]): Promise<number> {
    let failed = 0;
    for (const file of files) {
      try {
        await rm(file, { force: true });
      } catch (err) {
        failed += 1;
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[jobs] Failed to remove ${file}: ${message}`);
      }
    }
    return failed;
  }

  private async runJob(job: PipelineInput, client: QuestionGenerator): Promise<void> {
    const { id } = job;
    try {
      this.store.transition(id, "processing");
      console.log(`[jobs] ${id} processing`);

      this.store.transition(id, "extracting");
      const reference = await this.extract(job.referencePath, REFERENCE_MAX_PAGES);
      const syllabus = await this.extract(job.syllabusPath, SYLLABUS_MAX_PAGES);

      if (!reference.text.trim()) {
        console.error(`[jobs] ${id} no text extracted from reference file`);
        this.store.fail(id, JOB_MESSAGES.referenceEmpty);
        return;
      }
      if (!syllabus.text.trim()) {
        console.error(`[jobs] ${id} no text extracted from syllabus file`);
        this.store.fail(id, JOB_MESSAGES.syllabusEmpty);
        return;
      }

      this.store.transition(id, "generating_questions");
      console.log(`[jobs] ${id} calling generation backend`);
      const result = await client.generateQuestions({
        referenceText: reference.text,
        syllabusText: syllabus.text,
        counts: job.counts,
        customInstructions: job.customInstructions,
      });
      if (!result.success) {
        this.store.fail(id, describeGenerationFailure(result));
        return;
      }

      const parsed = parseQuestionResponse(result.content);
      const counts = countQuestions(parsed);
      console.log(`[jobs] ${id} parsed mcq=${counts.mcq} short=${counts.short} long=${counts.long}`);

      const outputFile = path.join(this.generatedDir, `${id}.xlsx`);
      const exported = await this.writeWorkbook(parsed, outputFile);
      if (!exported) {
        this.store.fail(id, JOB_MESSAGES.exportFailed);
        return;
      }
      this.store.complete(id, outputFile);
      console.log(`[jobs] ${id} completed`);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[jobs] ${id} failed: ${message}`);
      const current = this.store.get(id);
      if (current && !isTerminal(current.status)) {
        this.store.fail(id, message);
      }
    }
  }
}
