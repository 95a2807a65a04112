import pdf from 'pdf-parse';
import * as fsp from 'fs/promises';
import * as path from 'path';
import { DocumentReadError, toError } from '../types/errors';
import { splitSentences } from '../utils/sentence-splitter';

export interface DocumentPages {
  source: string;
  sourceType: 'pdf' | 'text';
  pages: string[];
}

export interface ReadPosition {
  page: number;  // 0-based
  line: number;  // 0-based, within `page`
}

export const PREVIEW_LINES = 25;

export interface PdfTextItem {
  str: string;
  transform: number[];
}

export interface PdfTextContent {
  items: PdfTextItem[];
}

/**
 * Page text the way pdf-parse builds it: items on the same baseline are
 * concatenated, a new baseline starts a new line.
 */
export function joinTextItems(items: PdfTextItem[]): string {
  let text = '';
  let lastY: number | undefined;
  for (const item of items) {
    const y = item.transform[5];
    text += lastY === undefined || y === lastY ? item.str : `\n${item.str}`;
    lastY = y;
  }
  return text;
}

async function readPdfPages(buffer: Buffer): Promise<string[]> {
  // Collected per page, since page text itself may contain blank lines.
  // pdf-parse renders pages one at a time and awaits each result.
  const pages: string[] = [];
  await pdf(buffer, {
    pagerender: (pageData) =>
      pageData
        .getTextContent({ normalizeWhitespace: false, disableCombineTextItems: false })
        .then((content: PdfTextContent) => {
          const text = joinTextItems(content.items);
          pages.push(text);
          return text;
        }),
  });
  return pages;
}

/**
 * Load a document as pages of text. PDFs go through pdf-parse; anything else
 * is read as UTF-8 with form feeds as page breaks.
 */
export async function readDocument(filePath: string): Promise<DocumentPages> {
  try {
    const buffer = await fsp.readFile(filePath);
    const isPdf = path.extname(filePath).toLowerCase() === '.pdf' || buffer.subarray(0, 4).toString('latin1') === '%PDF';
    if (isPdf) {
      return { source: filePath, sourceType: 'pdf', pages: await readPdfPages(buffer) };
    }
    return { source: filePath, sourceType: 'text', pages: buffer.toString('utf8').split('\f') };
  } catch (error) {
    throw new DocumentReadError(filePath, toError(error));
  }
}

export function pageLines(doc: DocumentPages, page: number): string[] {
  const text = doc.pages[page];
  return text === undefined ? [] : text.split(/\r?\n/);
}

/**
 * First lines of a page, for picking where to start reading.
 */
export function previewPage(doc: DocumentPages, page: number, maxLines = PREVIEW_LINES): string[] {
  return pageLines(doc, page).slice(0, maxLines);
}

/**
 * Sentences from `position` to the end of the document. Each page is split
 * on its own; only the starting page is cut at `position.line`.
 */
export function extractSentences(doc: DocumentPages, position: ReadPosition): string[] {
  if (position.page < 0 || position.page >= doc.pages.length) {
    throw new RangeError(`page ${position.page + 1} is outside 1-${doc.pages.length}`);
  }
  const sentences: string[] = [];
  for (let page = position.page; page < doc.pages.length; page++) {
    let lines = pageLines(doc, page);
    if (page === position.page) lines = lines.slice(Math.max(position.line, 0));
    if (lines.every((l) => !l.trim())) continue;
    sentences.push(...splitSentences(lines.join(' ')));
  }
  return sentences;
}
