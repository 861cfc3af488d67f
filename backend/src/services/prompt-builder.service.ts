import type { QuestionCounts } from "../../../shared/api.js";
import {
  REFERENCE_WINDOW_CHARS,
  SECTION_HEADERS,
  SYLLABUS_WINDOW_CHARS,
} from "../config/generation.config.js";

export interface GenerationRequest {
  referenceText: string;
  syllabusText: string;
  counts: QuestionCounts;
  customInstructions?: string;
}

export interface QuestionPrompt {
  system: string;
  prompt: string;
}

export function buildQuestionPrompt(request: GenerationRequest): QuestionPrompt {
  const { counts } = request;
  const instructions = request.customInstructions?.trim() ? request.customInstructions : "";
  const system = [
    "You are an expert educator who creates high-quality exam questions based on reference materials.",
    "",
    "Generate exactly the following questions:",
    `- ${counts.mcq} multiple-choice questions (each with exactly 4 options, A) to D), and the correct answer marked)`,
    `- ${counts.short} short answer questions`,
    `- ${counts.long} long answer questions`,
    "",
    "The questions should be based on the provided reference book content and aligned with the syllabus.",
    ...(instructions ? ["", instructions] : []),
    "",
    "Format the output with these section headers, exactly as written:",
    "",
    `${SECTION_HEADERS.mcq}:`,
    "Q1. [Question text]",
    "A) Option A",
    "B) Option B",
    "C) Option C",
    "D) Option D",
    "Answer: [Correct option]",
    "",
    `${SECTION_HEADERS.short}:`,
    "Q1. [Question text]",
    "",
    `${SECTION_HEADERS.long}:`,
    "Q1. [Question text]",
  ].join("\n");

  const prompt = [
    `SYLLABUS: ${request.syllabusText.slice(0, SYLLABUS_WINDOW_CHARS)}...`,
    "",
    `REFERENCE MATERIAL: ${request.referenceText.slice(0, REFERENCE_WINDOW_CHARS)}...`,
  ].join("\n");

  return { system, prompt };
}
