/**
 * HTML analyzer backed by cheerio
 */

import { promises as fs } from 'node:fs';
import type { DocumentMetadata } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { canLoad, lazyModule } from './base.js';
import type { Analyzer } from './types.js';

const loadCheerio = lazyModule(() => import('cheerio'));

const COMMON_TAGS = [
  'p', 'div', 'span', 'a', 'img', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'table', 'tr', 'td', 'ul', 'ol', 'li', 'form', 'input', 'button',
];

const MAX_LINKS = 20;
const MAX_IMAGES = 10;

/**
 * Collapse extracted page text into one line of phrases.
 * Each line is trimmed, then split on double spaces.
 */
export function collapseWhitespace(text: string): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .flatMap((line) => line.split('  '))
    .map((phrase) => phrase.trim())
    .filter((phrase) => phrase.length > 0)
    .join(' ');
}

export class HtmlAnalyzer implements Analyzer {
  readonly format = 'HTML';
  readonly library = 'cheerio';

  constructor(private readonly logger: Logger = silentLogger) {}

  async extractText(filePath: string): Promise<string> {
    try {
      const { load } = await loadCheerio();
      const $ = load(await fs.readFile(filePath, 'utf-8'));
      $('script, style').remove();
      return collapseWhitespace($.root().text());
    } catch (error) {
      this.logger.error('analyze', `Error reading HTML file ${filePath}: ${errorMessage(error)}`);
      return `Error reading HTML file: ${errorMessage(error)}`;
    }
  }

  async extractMetadata(filePath: string): Promise<DocumentMetadata> {
    try {
      const { load } = await loadCheerio();
      const $ = load(await fs.readFile(filePath, 'utf-8'));
      const metadata: DocumentMetadata = { fileType: 'html' };

      const title = $('title').first();
      if (title.length > 0) {
        metadata.title = title.text().trim();
      }

      const metaTags: Record<string, string> = {};
      $('meta').each((_, element) => {
        const meta = $(element);
        const name = meta.attr('name') ?? meta.attr('property') ?? meta.attr('http-equiv');
        const content = meta.attr('content');
        if (name && content) {
          metaTags[name] = content;
        }
      });
      if (Object.keys(metaTags).length > 0) {
        metadata.metaTags = metaTags;
      }

      const tagCounts: Record<string, number> = {};
      for (const tag of COMMON_TAGS) {
        const count = $(tag).length;
        if (count > 0) {
          tagCounts[tag] = count;
        }
      }
      metadata.tagCounts = tagCounts;

      const links: Array<{ url: string; text: string }> = [];
      $('a[href]').each((_, element) => {
        const link = $(element);
        const href = link.attr('href') ?? '';
        if (href && !href.startsWith('#')) {
          links.push({ url: href, text: link.text().trim() });
        }
      });
      if (links.length > 0) {
        metadata.links = links.slice(0, MAX_LINKS);
        metadata.linkCount = links.length;
      }

      const images: Array<{ src: string; alt: string }> = [];
      $('img[src]').each((_, element) => {
        const image = $(element);
        images.push({ src: image.attr('src') ?? '', alt: image.attr('alt') ?? '' });
      });
      if (images.length > 0) {
        metadata.images = images.slice(0, MAX_IMAGES);
        metadata.imageCount = images.length;
      }

      return metadata;
    } catch (error) {
      this.logger.error('analyze', `Error extracting HTML metadata from ${filePath}: ${errorMessage(error)}`);
      return { error: errorMessage(error) };
    }
  }

  checkAvailability(): Promise<boolean> {
    return canLoad(loadCheerio);
  }
}
