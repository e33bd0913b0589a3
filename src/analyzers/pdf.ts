/**
 * PDF analyzer backed by unpdf
 */

import { promises as fs } from 'node:fs';
import type { getDocumentProxy } from 'unpdf';
import type { DocumentMetadata } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { canLoad, lazyModule, pickStrings } from './base.js';
import type { Analyzer } from './types.js';

const loadUnpdf = lazyModule(() => import('unpdf'));

const INFO_FIELDS: Record<string, string> = {
  Title: 'title',
  Author: 'author',
  Subject: 'subject',
  Creator: 'creator',
  Producer: 'producer',
  CreationDate: 'creationDate',
  ModDate: 'modificationDate',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;

/**
 * Open a document, run `use` on it, then release it
 */
async function withDocument<T>(filePath: string, use: (pdf: PdfDocument) => Promise<T>): Promise<T> {
  const unpdf = await loadUnpdf();
  const data = await fs.readFile(filePath);
  // verbosity 0 keeps pdf.js warnings off stdout
  const pdf = await unpdf.getDocumentProxy(new Uint8Array(data), { verbosity: 0 });
  try {
    return await use(pdf);
  } finally {
    await pdf.destroy();
  }
}

export class PdfAnalyzer implements Analyzer {
  readonly format = 'PDF';
  readonly library = 'unpdf';

  constructor(private readonly logger: Logger = silentLogger) {}

  async extractText(filePath: string): Promise<string> {
    try {
      const { extractText } = await loadUnpdf();
      const { text } = await withDocument(filePath, (pdf) => extractText(pdf, { mergePages: false }));
      const pages = Array.isArray(text) ? text : [text];

      let output = '';
      pages.forEach((pageText, index) => {
        if (pageText) {
          output += `\n--- Page ${index + 1} ---\n`;
          output += pageText;
        }
      });
      return output;
    } catch (error) {
      this.logger.error('analyze', `Error reading PDF file ${filePath}: ${errorMessage(error)}`);
      return `Error reading PDF: ${errorMessage(error)}`;
    }
  }

  async extractMetadata(filePath: string): Promise<DocumentMetadata> {
    try {
      const { getMeta } = await loadUnpdf();
      const { info, pageCount } = await withDocument(filePath, async (pdf) => ({
        ...(await getMeta(pdf)),
        pageCount: pdf.numPages,
      }));

      return {
        fileType: 'pdf',
        pageCount,
        ...(isRecord(info) ? pickStrings(info, INFO_FIELDS) : {}),
      };
    } catch (error) {
      this.logger.error('analyze', `Error extracting PDF metadata from ${filePath}: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  checkAvailability(): Promise<boolean> {
    return canLoad(loadUnpdf);
  }
}
