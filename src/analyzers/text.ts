/**
 * Plain text and markdown analyzer
 */

import { promises as fs } from 'node:fs';
import type { DocumentMetadata } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { fileExtension } from '../scanner/classifier.js';
import { canLoad, lazyModule } from './base.js';
import type { Analyzer } from './types.js';

const loadChardet = lazyModule(() => import('chardet'));

interface DecodedText {
  content: string;
  encoding: string;
  confidence: number;
}

function decode(buffer: Uint8Array, encoding: string): string {
  try {
    return new TextDecoder(encoding).decode(buffer);
  } catch (error) {
    // Labels the WHATWG decoder does not know (e.g. UTF-32) fall back to utf-8
    if (error instanceof RangeError) {
      return new TextDecoder('utf-8').decode(buffer);
    }
    throw error;
  }
}

/**
 * Read a file and decode it with the most likely encoding
 */
export async function readDecoded(filePath: string): Promise<DecodedText> {
  const { analyse } = await loadChardet();
  const buffer = await fs.readFile(filePath);
  const [best] = analyse(buffer);

  if (!best) {
    return { content: decode(buffer, 'utf-8'), encoding: 'unknown', confidence: 0 };
  }

  return {
    content: decode(buffer, best.name),
    encoding: best.name,
    confidence: best.confidence / 100,
  };
}

/**
 * Count lines the way a line iterator would: a trailing newline does not
 * start a new line, and an empty file has none
 */
export function countLines(content: string): number {
  if (content === '') return 0;
  const lines = content.split(/\r\n|\r|\n/);
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}

export class TextAnalyzer implements Analyzer {
  readonly format = 'Text';
  readonly library = 'chardet';

  constructor(private readonly logger: Logger = silentLogger) {}

  async extractText(filePath: string): Promise<string> {
    try {
      const { content } = await readDecoded(filePath);
      return content;
    } catch (error) {
      this.logger.error('analyze', `Error reading text file ${filePath}: ${errorMessage(error)}`);
      return '';
    }
  }

  async extractMetadata(filePath: string): Promise<DocumentMetadata> {
    try {
      const stat = await fs.stat(filePath);
      const { content, encoding, confidence } = await readDecoded(filePath);
      const ext = fileExtension(filePath);

      return {
        fileType: 'text',
        encoding,
        encodingConfidence: confidence,
        lineCount: countLines(content),
        sizeBytes: stat.size,
        isMarkdown: ext === '.md' || ext === '.markdown',
      };
    } catch (error) {
      this.logger.error('analyze', `Error extracting metadata from ${filePath}: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  checkAvailability(): Promise<boolean> {
    return canLoad(loadChardet);
  }
}
