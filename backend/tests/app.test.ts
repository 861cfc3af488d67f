import type { Server } from "node:http";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import type { JobStatusSuccess, UploadSuccess } from "../../shared/api.js";
import { allowedFile, createApp, readCounts } from "../src/app.js";
import { JobOrchestrator } from "../src/jobs/job.orchestrator.js";
import type { QuestionGenerator } from "../src/services/question-generation.service.js";

const REPLY = [
  "MULTIPLE CHOICE QUESTIONS:",
  "Q1. Pick the prime number.",
  "A) 4",
  "B) 6",
  "C) 7",
  "D) 9",
  "Answer: C",
  "SHORT ANSWER QUESTIONS:",
  "Q1. Define a prime number.",
  "LONG ANSWER QUESTIONS:",
  "Q1. Prove there are infinitely many primes.",
].join("\n");

function pdfBlob(content: string) {
  return new Blob([content], { type: "application/pdf" });
}

function uploadForm(overrides: Record<string, string> = {}, names = { reference: "book.pdf", syllabus: "syllabus.pdf" }) {
  const form = new FormData();
  form.append("reference_book", pdfBlob("%PDF-1.4 reference"), names.reference);
  form.append("syllabus", pdfBlob("%PDF-1.4 syllabus"), names.syllabus);
  for (const [key, value] of Object.entries(overrides)) form.append(key, value);
  return form;
}

describe("HTTP API", () => {
  let root: string;
  let server: Server;
  let baseUrl: string;
  let orchestrator: JobOrchestrator;
  let generateQuestions: Mock<QuestionGenerator["generateQuestions"]>;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    root = await mkdtemp(path.join(os.tmpdir(), "api-"));
    generateQuestions = vi
      .fn<QuestionGenerator["generateQuestions"]>()
      .mockResolvedValue({ success: true, content: REPLY, error: null });
    orchestrator = new JobOrchestrator({
      uploadDir: path.join(root, "uploads"),
      generatedDir: path.join(root, "generated"),
      backend: { state: "ready", client: { generateQuestions } },
      maxConcurrentJobs: 1,
      maxQueuedJobs: 1,
      jobTtlMs: 0,
      extract: async (filePath) => ({
        text: `text of ${path.basename(filePath)}`,
        pageCount: 1,
        pagesRead: 1,
        pageLimited: false,
        sizeLimited: false,
      }),
    });
    await orchestrator.init();
    const app = createApp({ orchestrator, maxUploadBytes: 1024 * 1024 });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server did not bind a TCP port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("reports health and generation state", async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(await res.json()).toEqual({ status: "ok", generation: "ready" });
  });

  it("accepts an upload, completes the job and serves the workbook", async () => {
    const res = await fetch(`${baseUrl}/api/upload`, {
      method: "POST",
      body: uploadForm({ mcq_count: "1", short_count: "1", long_count: "1", custom_instructions: "Keep it short." }),
    });
    expect(res.status).toBe(200);
    const { jobId } = (await res.json()) as UploadSuccess;

    await orchestrator.settled(jobId);
    expect(generateQuestions).toHaveBeenCalledWith({
      referenceText: `text of ${jobId}_reference.pdf`,
      syllabusText: `text of ${jobId}_syllabus.pdf`,
      counts: { mcq: 1, short: 1, long: 1 },
      customInstructions: "Keep it short.",
    });

    const status = await fetch(`${baseUrl}/api/status/${jobId}`);
    const body = (await status.json()) as JobStatusSuccess;
    expect(body.ok).toBe(true);
    expect(body.job.status).toBe("completed");

    const download = await fetch(`${baseUrl}/api/download/${jobId}`);
    expect(download.status).toBe(200);
    expect(download.headers.get("content-type")).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
    );
    expect(download.headers.get("content-disposition")).toBe('attachment; filename="question_bank.xlsx"');
    const bytes = new Uint8Array(await download.arrayBuffer());
    expect([bytes[0], bytes[1]]).toEqual([0x50, 0x4b]);
  });

  it("uses the default counts when none are given", async () => {
    const res = await fetch(`${baseUrl}/api/upload`, { method: "POST", body: uploadForm() });
    const { jobId } = (await res.json()) as UploadSuccess;
    await orchestrator.settled(jobId);

    expect(generateQuestions.mock.calls[0][0].counts).toEqual({ mcq: 5, short: 3, long: 2 });
    expect(generateQuestions.mock.calls[0][0].customInstructions).toBe("");
  });

  it("rejects an upload missing a file", async () => {
    const form = new FormData();
    form.append("reference_book", pdfBlob("x"), "book.pdf");

    const res = await fetch(`${baseUrl}/api/upload`, { method: "POST", body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      ok: false,
      apiVersion: "v1",
      error: "Missing required files",
      errorType: "BAD_REQUEST",
    });
    expect(orchestrator.store.size).toBe(0);
  });

  it("rejects files that are not PDFs", async () => {
    const res = await fetch(`${baseUrl}/api/upload`, {
      method: "POST",
      body: uploadForm({}, { reference: "book.docx", syllabus: "syllabus.pdf" }),
    });

    expect(res.status).toBe(400);
    expect(((await res.json()) as { error: string }).error).toBe("Invalid file type. Only PDF files are allowed");
  });

  it("rejects malformed counts", async () => {
    const res = await fetch(`${baseUrl}/api/upload`, {
      method: "POST",
      body: uploadForm({ mcq_count: "five" }),
    });

    expect(res.status).toBe(400);
    expect(((await res.json()) as { error: string }).error).toBe("mcq_count must be a whole number.");
  });

  it("returns 404 for an unknown job", async () => {
    const status = await fetch(`${baseUrl}/api/status/nope`);
    const download = await fetch(`${baseUrl}/api/download/nope`);

    expect(status.status).toBe(404);
    expect(((await status.json()) as { error: string }).error).toBe("Job not found");
    expect(download.status).toBe(404);
  });

  it("refuses to download a job that has not completed", async () => {
    generateQuestions.mockResolvedValue({
      success: false,
      content: null,
      error: "API Error: boom",
      errorKind: "failed",
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const res = await fetch(`${baseUrl}/api/upload`, { method: "POST", body: uploadForm() });
    const { jobId } = (await res.json()) as UploadSuccess;
    await orchestrator.settled(jobId);

    const download = await fetch(`${baseUrl}/api/download/${jobId}`);

    expect(download.status).toBe(404);
    expect(((await download.json()) as { error: string }).error).toBe("File not ready or job not found");
  });
});

describe("upload helpers", () => {
  it("accepts only the pdf extension, case-insensitively", () => {
    expect(allowedFile("Notes.PDF")).toBe(true);
    expect(allowedFile("notes.pdf.exe")).toBe(false);
    expect(allowedFile("notes")).toBe(false);
  });

  it("parses counts with defaults and bounds", () => {
    expect(readCounts({ mcq_count: "10", short_count: "" })).toEqual({ mcq: 10, short: 3, long: 2 });
    expect(() => readCounts({ long_count: "51" })).toThrow("long_count must be at most 50.");
    expect(() => readCounts({ short_count: "-1" })).toThrow("short_count must be a whole number.");
  });
});
