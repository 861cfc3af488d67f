import { readFile } from "node:fs/promises";
import { PDFParse } from "pdf-parse";
import {
  HARD_PAGE_LIMIT,
  LOW_TEXT_WARNING_CHARS,
  MAX_EXTRACTED_CHARS,
} from "../config/extraction.config.js";

export interface PageReader {
  readonly pageCount: number;
  /** 1-based page number. */
  pageText(pageNumber: number): Promise<string>;
  close(): Promise<void>;
}

export type OpenPageReader = (filePath: string) => Promise<PageReader>;

export interface ExtractedDocument {
  text: string;
  pageCount: number;
  pagesRead: number;
  pageLimited: boolean;
  sizeLimited: boolean;
}

export interface ExtractOptions {
  maxPages?: number;
  openReader?: OpenPageReader;
}

const EMPTY_DOCUMENT: ExtractedDocument = {
  text: "",
  pageCount: 0,
  pagesRead: 0,
  pageLimited: false,
  sizeLimited: false,
};

export async function openPdfReader(filePath: string): Promise<PageReader> {
  const data = await readFile(filePath);
  const parser = new PDFParse({ data: new Uint8Array(data) });
  try {
    const info = await parser.getInfo();
    return {
      pageCount: info.total,
      async pageText(pageNumber: number) {
        const result = await parser.getText({ partial: [pageNumber] });
        return result.pages[0]?.text ?? "";
      },
      async close() {
        await parser.destroy();
      },
    };
  } catch (err) {
    await parser.destroy();
    throw err;
  }
}

function shouldLogPage(index: number): boolean {
  return index < 10 || index % 50 === 0;
}

export async function extractText(
  filePath: string,
  options: ExtractOptions = {}
): Promise<ExtractedDocument> {
  const openReader = options.openReader ?? openPdfReader;
  let reader: PageReader;
  try {
    reader = await openReader(filePath);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[pdf] Error extracting text from ${filePath}: ${message}`);
    return { ...EMPTY_DOCUMENT };
  }

  try {
    const pageCount = reader.pageCount;
    let limit = Math.min(pageCount, HARD_PAGE_LIMIT);
    if (options.maxPages !== undefined && options.maxPages < limit) {
      limit = Math.max(0, options.maxPages);
    }
    console.log(`[pdf] Processing ${filePath} with ${pageCount} pages`);
    if (limit < pageCount) {
      console.log(`[pdf] Large PDF detected (${pageCount} pages). Processing first ${limit} pages only.`);
    }

    let text = "";
    let pagesRead = 0;
    let sizeLimited = false;
    for (let index = 0; index < limit; index += 1) {
      pagesRead = index + 1;
      try {
        const pageText = await reader.pageText(index + 1);
        text += `${pageText}\n`;
        if (shouldLogPage(index)) {
          console.log(`[pdf] Page ${index + 1}: extracted ${pageText.length} characters`);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[pdf] Error processing page ${index + 1}: ${message}`);
        continue;
      }
      if (text.length > MAX_EXTRACTED_CHARS) {
        text = text.slice(0, MAX_EXTRACTED_CHARS);
        sizeLimited = true;
        console.log(`[pdf] Sufficient text extracted. Stopping at page ${index + 1}`);
        break;
      }
    }

    console.log(`[pdf] Total extracted text length: ${text.length}`);
    if (text.length < LOW_TEXT_WARNING_CHARS) {
      console.warn("[pdf] Very little text extracted. PDF might be image-based.");
    }
    return {
      text,
      pageCount,
      pagesRead,
      pageLimited: limit < pageCount,
      sizeLimited,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[pdf] Error extracting text from ${filePath}: ${message}`);
    return { ...EMPTY_DOCUMENT };
  } finally {
    await reader.close().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[pdf] Failed to release ${filePath}: ${message}`);
    });
  }
}
