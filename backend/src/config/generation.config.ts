import type { QuestionCounts } from "../../../shared/api.js";

export const SYLLABUS_WINDOW_CHARS = 2000;
export const REFERENCE_WINDOW_CHARS = 4000;

export const SECTION_HEADERS = {
  mcq: "MULTIPLE CHOICE QUESTIONS",
  short: "SHORT ANSWER QUESTIONS",
  long: "LONG ANSWER QUESTIONS",
} as const;

export const DEFAULT_COUNTS: QuestionCounts = { mcq: 5, short: 3, long: 2 };
export const MAX_COUNT_PER_SECTION = 50;

export const GENERATION_TEMPERATURE = 0.7;
export const GENERATION_MAX_TOKENS = 3000;
