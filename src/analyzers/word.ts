/**
 * Word analyzer
 * .docx is read with mammoth; legacy binary .doc is reported as unsupported
 */

import type { DocumentMetadata } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { fileExtension } from '../scanner/classifier.js';
import { canLoad, lazyModule } from './base.js';
import type { Analyzer } from './types.js';

const loadMammoth = lazyModule(async () => (await import('mammoth')).default);
const loadCheerio = lazyModule(() => import('cheerio'));

export const LEGACY_DOC_MESSAGE = 'Legacy .doc files not supported. Please convert to .docx format.';

export class WordAnalyzer implements Analyzer {
  readonly format = 'Word';
  readonly library = 'mammoth';

  constructor(private readonly logger: Logger = silentLogger) {}

  async extractText(filePath: string): Promise<string> {
    if (fileExtension(filePath) === '.doc') {
      return LEGACY_DOC_MESSAGE;
    }

    try {
      const mammoth = await loadMammoth();
      const { value } = await mammoth.extractRawText({ path: filePath });
      return value
        .split('\n')
        .filter((line) => line.trim() !== '')
        .join('\n');
    } catch (error) {
      this.logger.error('analyze', `Error reading Word document ${filePath}: ${errorMessage(error)}`);
      return `Error reading Word document: ${errorMessage(error)}`;
    }
  }

  async extractMetadata(filePath: string): Promise<DocumentMetadata> {
    if (fileExtension(filePath) === '.doc') {
      return { fileType: 'word_legacy', error: 'Legacy .doc format not supported' };
    }

    try {
      const mammoth = await loadMammoth();
      const { value: html, messages } = await mammoth.convertToHtml({ path: filePath });
      const { load } = await loadCheerio();
      const $ = load(html);

      return {
        fileType: 'word_docx',
        paragraphCount: $('p').length,
        tableCount: $('table').length,
        headingCount: $('h1, h2, h3, h4, h5, h6').length,
        imageCount: $('img').length,
        conversionWarnings: messages.length,
      };
    } catch (error) {
      this.logger.error('analyze', `Error extracting Word metadata from ${filePath}: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  checkAvailability(): Promise<boolean> {
    return canLoad(loadMammoth);
  }
}
