export type McqRecord = {
  kind: "mcq";
  question: string;
  options: string[];
  answer: string;
};

export type ShortAnswerRecord = { kind: "short"; question: string };

export type LongAnswerRecord = { kind: "long"; question: string };

export type QuestionRecord = McqRecord | ShortAnswerRecord | LongAnswerRecord;

export type Section = QuestionRecord["kind"];

export type ParsedQuestions = {
  mcq: McqRecord[];
  short: ShortAnswerRecord[];
  long: LongAnswerRecord[];
};

// Only "Q" and "1." through "5." open a question; a "6." line is not recognised.
const QUESTION_PREFIXES = ["Q", "1.", "2.", "3.", "4.", "5."];
const OPTION_PREFIXES = ["A)", "B)", "C)", "D)", "A.", "B.", "C.", "D."];

function startsWithAny(line: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => line.startsWith(prefix));
}

export function detectSection(line: string): Section | null {
  const upper = line.toUpperCase();
  if (upper.includes("MULTIPLE CHOICE") || upper.startsWith("MCQ")) return "mcq";
  if (upper.includes("SHORT ANSWER")) return "short";
  if (upper.includes("LONG ANSWER")) return "long";
  return null;
}

function startRecord(section: Section, question: string): QuestionRecord {
  if (section === "mcq") return { kind: "mcq", question, options: [], answer: "" };
  return { kind: section, question };
}

export function parseQuestionResponse(reply: string): ParsedQuestions {
  const parsed: ParsedQuestions = { mcq: [], short: [], long: [] };
  let section: Section | null = null;
  let current: QuestionRecord | null = null;

  const flush = () => {
    if (!current || !current.question) {
      current = null;
      return;
    }
    if (current.kind === "mcq") parsed.mcq.push(current);
    else if (current.kind === "short") parsed.short.push(current);
    else parsed.long.push(current);
    current = null;
  };

  for (const rawLine of reply.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = detectSection(line);
    if (header) {
      flush();
      section = header;
      continue;
    }
    if (!section) continue;

    if (startsWithAny(line, QUESTION_PREFIXES)) {
      flush();
      current = startRecord(section, line);
      continue;
    }
    if (section !== "mcq" || !current || current.kind !== "mcq") continue;

    if (startsWithAny(line, OPTION_PREFIXES)) {
      current.options.push(line);
    } else {
      const upper = line.toUpperCase();
      if (upper.includes("ANSWER:") || upper.includes("CORRECT:")) {
        current.answer = line;
      }
    }
  }
  flush();

  return parsed;
}

export function countQuestions(parsed: ParsedQuestions): Record<Section, number> {
  return { mcq: parsed.mcq.length, short: parsed.short.length, long: parsed.long.length };
}
