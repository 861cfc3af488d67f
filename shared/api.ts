export const API_VERSION = "v1" as const;

export type JobStatus =
  | "queued"
  | "processing"
  | "extracting"
  | "generating_questions"
  | "completed"
  | "error";

export type QuestionCounts = {
  mcq: number;
  short: number;
  long: number;
};

export type JobRecord = {
  id: string;
  status: JobStatus;
  createdAt: number;
  updatedAt: number;
  resultFile: string | null;
  error: string | null;
};

export type UploadSuccess = {
  ok: true;
  apiVersion: typeof API_VERSION;
  jobId: string;
};

export type JobStatusSuccess = {
  ok: true;
  apiVersion: typeof API_VERSION;
  job: JobRecord;
};

export type ApiErrorType = "BAD_REQUEST" | "NOT_FOUND" | "QUEUE_FULL" | "INTERNAL";

export type ApiError = {
  ok: false;
  apiVersion: typeof API_VERSION;
  error: string;
  errorType: ApiErrorType;
};

export type UploadResponse = UploadSuccess | ApiError;

export type JobStatusResponse = JobStatusSuccess | ApiError;

export type HealthResponse = {
  status: "ok";
  generation: "ready" | "unavailable";
};
