import express, { type ErrorRequestHandler, type Request, type Response } from "express";
import multer from "multer";
import {
  API_VERSION,
  type ApiError,
  type ApiErrorType,
  type HealthResponse,
  type JobStatusSuccess,
  type QuestionCounts,
  type UploadSuccess,
} from "../../shared/api.js";
import { DEFAULT_COUNTS, MAX_COUNT_PER_SECTION } from "./config/generation.config.js";
import type { JobOrchestrator } from "./jobs/job.orchestrator.js";
import { XLSX_MIME_TYPE } from "./services/workbook-export.service.js";

const ALLOWED_EXTENSIONS = new Set(["pdf"]);
const DOWNLOAD_NAME = "question_bank.xlsx";

export interface CreateAppOptions {
  orchestrator: JobOrchestrator;
  maxUploadBytes: number;
}

class BadRequestError extends Error {}

function sendError(res: Response, status: number, errorType: ApiErrorType, error: string) {
  return res.status(status).json({
    ok: false,
    apiVersion: API_VERSION,
    error,
    errorType,
  } satisfies ApiError);
}

export function allowedFile(filename: string): boolean {
  const dot = filename.lastIndexOf(".");
  if (dot < 0) return false;
  return ALLOWED_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase());
}

function readCount(body: Record<string, unknown>, field: string, fallback: number): number {
  const raw = body[field];
  if (raw === undefined || raw === "") return fallback;
  if (typeof raw !== "string" || !/^\s*\d+\s*$/.test(raw)) {
    throw new BadRequestError(`${field} must be a whole number.`);
  }
  const value = Number(raw);
  if (value > MAX_COUNT_PER_SECTION) {
    throw new BadRequestError(`${field} must be at most ${MAX_COUNT_PER_SECTION}.`);
  }
  return value;
}

export function readCounts(body: Record<string, unknown>): QuestionCounts {
  return {
    mcq: readCount(body, "mcq_count", DEFAULT_COUNTS.mcq),
    short: readCount(body, "short_count", DEFAULT_COUNTS.short),
    long: readCount(body, "long_count", DEFAULT_COUNTS.long),
  };
}

function pickFile(req: Request, field: string): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

export function createApp({ orchestrator, maxUploadBytes }: CreateAppOptions) {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 2 },
  });

  app.use(express.json());
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (_req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    return next();
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", generation: orchestrator.generationState } satisfies HealthResponse);
  });

  app.post(
    "/api/upload",
    upload.fields([
      { name: "reference_book", maxCount: 1 },
      { name: "syllabus", maxCount: 1 },
    ]),
    async (req, res) => {
      try {
        const reference = pickFile(req, "reference_book");
        const syllabus = pickFile(req, "syllabus");
        if (!reference || !syllabus) {
          return sendError(res, 400, "BAD_REQUEST", "Missing required files");
        }
        if (!reference.originalname || !syllabus.originalname) {
          return sendError(res, 400, "BAD_REQUEST", "No selected file");
        }
        if (!allowedFile(reference.originalname) || !allowedFile(syllabus.originalname)) {
          return sendError(res, 400, "BAD_REQUEST", "Invalid file type. Only PDF files are allowed");
        }

        const body: Record<string, unknown> = req.body ?? {};
        const counts = readCounts(body);
        const customInstructions =
          typeof body.custom_instructions === "string" ? body.custom_instructions : "";

        const result = await orchestrator.submit({
          reference: { originalName: reference.originalname, data: reference.buffer },
          syllabus: { originalName: syllabus.originalname, data: syllabus.buffer },
          counts,
          customInstructions,
        });
        if (!result.ok) {
          return sendError(res, 503, "QUEUE_FULL", "Too many jobs in progress. Please try again later.");
        }
        return res.json({
          ok: true,
          apiVersion: API_VERSION,
          jobId: result.job.id,
        } satisfies UploadSuccess);
      } catch (err) {
        if (err instanceof BadRequestError) {
          return sendError(res, 400, "BAD_REQUEST", err.message);
        }
        const message = err instanceof Error ? err.message : "Unknown error";
        console.error(`[server] Upload failed: ${message}`);
        return sendError(res, 500, "INTERNAL", message);
      }
    }
  );

  app.get("/api/status/:jobId", (req, res) => {
    const job = orchestrator.getJob(req.params.jobId);
    if (!job) {
      return sendError(res, 404, "NOT_FOUND", "Job not found");
    }
    return res.json({ ok: true, apiVersion: API_VERSION, job } satisfies JobStatusSuccess);
  });

  app.get("/api/download/:jobId", (req, res, next) => {
    const job = orchestrator.getJob(req.params.jobId);
    if (!job || job.status !== "completed" || !job.resultFile) {
      return sendError(res, 404, "NOT_FOUND", "File not ready or job not found");
    }
    return res.download(
      job.resultFile,
      DOWNLOAD_NAME,
      { headers: { "Content-Type": XLSX_MIME_TYPE } },
      (err) => {
        if (err) next(err);
      }
    );
  });

  const handleErrors: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      return next(err);
    }
    if (err instanceof multer.MulterError) {
      return sendError(res, 400, "BAD_REQUEST", err.message);
    }
    const message = err instanceof Error ? err.message : "Unknown error";
    console.error(`[server] Request failed: ${message}`);
    return sendError(res, 500, "INTERNAL", message);
  };
  app.use(handleErrors);

  return app;
}
