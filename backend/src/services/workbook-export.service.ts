import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import ExcelJS from "exceljs";
import type { Workbook } from "exceljs";
import type { ParsedQuestions } from "./response-parser.service.js";

export const WORKBOOK_SHEETS = {
  mcq: "MCQs",
  short: "Short Answer",
  long: "Long Answer",
} as const;

export const XLSX_MIME_TYPE = "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

export function buildWorkbook(parsed: ParsedQuestions): Workbook {
  const workbook = new ExcelJS.Workbook();

  const mcqSheet = workbook.addWorksheet(WORKBOOK_SHEETS.mcq);
  mcqSheet.columns = [
    { header: "Question", key: "question", width: 60 },
    { header: "Options", key: "options", width: 50 },
    { header: "Answer", key: "answer", width: 30 },
  ];
  for (const record of parsed.mcq) {
    const row = mcqSheet.addRow({
      question: record.question,
      options: record.options.join("\n"),
      answer: record.answer,
    });
    row.getCell("options").alignment = { wrapText: true, vertical: "top" };
  }

  for (const kind of ["short", "long"] as const) {
    const sheet = workbook.addWorksheet(WORKBOOK_SHEETS[kind]);
    sheet.columns = [{ header: "Question", key: "question", width: 80 }];
    for (const record of parsed[kind]) {
      sheet.addRow({ question: record.question });
    }
  }

  return workbook;
}

export async function exportWorkbook(parsed: ParsedQuestions, outputFile: string): Promise<boolean> {
  try {
    await mkdir(path.dirname(outputFile), { recursive: true });
    await buildWorkbook(parsed).xlsx.writeFile(outputFile);
    console.log(`[excel] Workbook created: ${outputFile}`);
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[excel] Error creating workbook ${outputFile}: ${message}`);
    await rm(outputFile, { force: true }).catch((rmErr: unknown) => {
      const detail = rmErr instanceof Error ? rmErr.message : String(rmErr);
      console.warn(`[excel] Could not remove partial workbook ${outputFile}: ${detail}`);
    });
    return false;
  }
}
