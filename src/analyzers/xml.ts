/**
 * XML analyzer backed by fast-xml-parser
 */

import { promises as fs } from 'node:fs';
import type { DocumentMetadata } from '../types/document.js';
import { errorMessage } from '../types/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import { canLoad, lazyModule } from './base.js';
import type { Analyzer } from './types.js';

/**
 * Element tree reduced to what the survey reports
 */
export interface XmlElement {
  tag: string;
  attributes: Record<string, string>;
  /** Trimmed text before the first child element */
  text: string;
  children: XmlElement[];
}

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const loadParser = lazyModule(async () => {
  const { XMLParser, XMLValidator } = await import('fast-xml-parser');
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    parseTagValue: false,
    parseAttributeValue: false,
    ignoreDeclaration: true,
    ignorePiTags: true,
    trimValues: true,
  });
  return { parser, validator: XMLValidator };
});

class XmlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'XmlParseError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];

  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tag = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY);
    if (tag === undefined) continue;

    const attributes: Record<string, string> = {};
    const rawAttributes = node[ATTRIBUTES_KEY];
    if (isRecord(rawAttributes)) {
      for (const [name, value] of Object.entries(rawAttributes)) {
        attributes[name] = String(value);
      }
    }

    const rawChildren = node[tag];
    const first: unknown = Array.isArray(rawChildren) ? rawChildren[0] : undefined;
    const text = isRecord(first) && TEXT_KEY in first ? String(first[TEXT_KEY]).trim() : '';

    elements.push({ tag, attributes, text, children: toElements(rawChildren) });
  }
  return elements;
}

/**
 * Parse a document into its root element
 *
 * @throws XmlParseError when the document is not well-formed or has no root
 */
export async function parseXml(xml: string): Promise<XmlElement> {
  const { parser, validator } = await loadParser();
  const validation = validator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlParseError(`${msg}: line ${line}, column ${col}`);
  }

  const [root] = toElements(parser.parse(xml));
  if (!root) {
    throw new XmlParseError('no element found');
  }
  return root;
}

function* walk(element: XmlElement): Generator<XmlElement> {
  yield element;
  for (const child of element.children) {
    yield* walk(child);
  }
}

function maxDepth(element: XmlElement, depth = 0): number {
  if (element.children.length === 0) return depth;
  return Math.max(...element.children.map((child) => maxDepth(child, depth + 1)));
}

/**
 * Classify a document by its root tag
 */
export function documentType(rootTag: string): string {
  const tag = rootTag.toLowerCase();
  if (tag === 'html') return 'HTML-like XML';
  if (tag.includes('rss')) return 'RSS Feed';
  if (tag.includes('feed')) return 'Atom Feed';
  if (rootTag.endsWith('ml') || tag.includes('xml')) return 'Markup Document';
  return 'Generic XML';
}

function formatAttributes(attributes: Record<string, string>, separator: string, quote: string): string {
  return Object.entries(attributes)
    .map(([name, value]) => `${name}=${quote}${value}${quote}`)
    .join(separator);
}

/**
 * Render an indented element outline
 */
export function renderOutline(root: XmlElement): string {
  const lines = [`Root element: ${root.tag}`];
  if (Object.keys(root.attributes).length > 0) {
    lines.push(`Root attributes: ${formatAttributes(root.attributes, ', ', '')}`);
  }

  const visit = (element: XmlElement, level: number): void => {
    const indent = '  '.repeat(level);
    const attrs = formatAttributes(element.attributes, ' ', '"');
    lines.push(`${indent}<${element.tag}${attrs ? ` ${attrs}` : ''}>`);
    if (element.text) {
      lines.push(`${indent}  ${element.text}`);
    }
    for (const child of element.children) {
      visit(child, level + 1);
    }
  };
  visit(root, 0);

  return lines.join('\n');
}

export class XmlAnalyzer implements Analyzer {
  readonly format = 'XML';
  readonly library = 'fast-xml-parser';

  constructor(private readonly logger: Logger = silentLogger) {}

  async extractText(filePath: string): Promise<string> {
    try {
      const root = await parseXml(await fs.readFile(filePath, 'utf-8'));
      return renderOutline(root);
    } catch (error) {
      this.logger.error('analyze', `Error reading XML file ${filePath}: ${errorMessage(error)}`);
      if (error instanceof XmlParseError) {
        return `XML Parse Error: ${error.message}`;
      }
      return `Error reading XML file: ${errorMessage(error)}`;
    }
  }

  async extractMetadata(filePath: string): Promise<DocumentMetadata> {
    try {
      const root = await parseXml(await fs.readFile(filePath, 'utf-8'));

      const tagCounts: Record<string, number> = {};
      const namespaces: Record<string, number> = {};
      for (const element of walk(root)) {
        tagCounts[element.tag] = (tagCounts[element.tag] ?? 0) + 1;
        const separator = element.tag.indexOf(':');
        if (separator > 0) {
          const prefix = element.tag.slice(0, separator);
          namespaces[prefix] = (namespaces[prefix] ?? 0) + 1;
        }
      }

      const metadata: DocumentMetadata = {
        fileType: 'xml',
        rootElement: root.tag,
        rootAttributes: root.attributes,
        tagCounts,
        totalElements: Object.values(tagCounts).reduce((sum, count) => sum + count, 0),
        uniqueTags: Object.keys(tagCounts).length,
      };
      if (Object.keys(namespaces).length > 0) {
        metadata.namespaces = namespaces;
      }
      metadata.maxDepth = maxDepth(root);
      metadata.documentType = documentType(root.tag);

      return metadata;
    } catch (error) {
      this.logger.error('analyze', `Error extracting XML metadata from ${filePath}: ${errorMessage(error)}`);
      if (error instanceof XmlParseError) {
        return { error: `XML Parse Error: ${error.message}` };
      }
      return { error: errorMessage(error) };
    }
  }

  checkAvailability(): Promise<boolean> {
    return canLoad(loadParser);
  }
}
