import { mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import ExcelJS from "exceljs";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ParsedQuestions } from "../src/services/response-parser.service.js";
import { buildWorkbook, exportWorkbook } from "../src/services/workbook-export.service.js";

const parsed: ParsedQuestions = {
  mcq: [
    {
      kind: "mcq",
      question: "Q1. Which gas do plants absorb?",
      options: ["A) Oxygen", "B) Carbon dioxide", "C) Nitrogen", "D) Helium"],
      answer: "Answer: B",
    },
  ],
  short: [
    { kind: "short", question: "Q1. Define photosynthesis." },
    { kind: "short", question: "Q2. Name a C4 plant." },
  ],
  long: [],
};

async function readBack(file: string) {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  return workbook;
}

describe("buildWorkbook", () => {
  it("creates the three sheets in order", () => {
    const workbook = buildWorkbook(parsed);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual(["MCQs", "Short Answer", "Long Answer"]);
  });

  it("joins options with newlines", () => {
    const sheet = buildWorkbook(parsed).getWorksheet("MCQs");

    expect(sheet?.getCell("B2").value).toBe("A) Oxygen\nB) Carbon dioxide\nC) Nitrogen\nD) Helium");
    expect(sheet?.getCell("C2").value).toBe("Answer: B");
  });
});

describe("exportWorkbook", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "workbook-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one row per question under a header row", async () => {
    const file = path.join(dir, "out.xlsx");

    await expect(exportWorkbook(parsed, file)).resolves.toBe(true);

    const workbook = await readBack(file);
    const mcq = workbook.getWorksheet("MCQs");
    expect(mcq?.rowCount).toBe(2);
    expect(mcq?.getCell("A1").value).toBe("Question");
    expect(mcq?.getCell("B1").value).toBe("Options");
    expect(mcq?.getCell("C1").value).toBe("Answer");
    expect(mcq?.getCell("A2").value).toBe("Q1. Which gas do plants absorb?");

    const short = workbook.getWorksheet("Short Answer");
    expect(short?.rowCount).toBe(3);
    expect(short?.getCell("A3").value).toBe("Q2. Name a C4 plant.");
  });

  it("keeps headers on empty sheets", async () => {
    const file = path.join(dir, "empty.xlsx");

    await exportWorkbook({ mcq: [], short: [], long: [] }, file);

    const workbook = await readBack(file);
    expect(workbook.worksheets).toHaveLength(3);
    for (const sheet of workbook.worksheets) {
      expect(sheet.rowCount).toBe(1);
      expect(sheet.getCell("A1").value).toBe("Question");
    }
    expect(workbook.getWorksheet("Long Answer")?.getCell("B1").value).toBeNull();
    expect(workbook.getWorksheet("MCQs")?.getCell("C1").value).toBe("Answer");
  });

  it("returns false when the file cannot be written", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const blocker = path.join(dir, "not-a-directory");
    await writeFile(blocker, "x");

    const ok = await exportWorkbook(parsed, path.join(blocker, "out.xlsx"));

    expect(ok).toBe(false);
    await expect(stat(path.join(blocker, "out.xlsx"))).rejects.toThrow();
    error.mockRestore();
  });
});
