import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode, type Element } from 'domhandler';
import { MalformedDocumentError } from '../core/errors.js';
import type { FilingId, NormalizedDocument, ParagraphSpan, RawFiling } from '../core/types.js';

export const PARAGRAPH_SEPARATOR = '\n\n';

const REMOVED_TAGS = new Set([
  'script', 'style', 'noscript', 'head', 'title', 'meta', 'link', 'template',
  'ix:header', 'ix:hidden', 'ix:references', 'ix:resources',
  'xbrli:context', 'xbrli:unit',
]);

const BLOCK_TAGS = new Set([
  'address', 'article', 'aside', 'blockquote', 'body', 'caption', 'center',
  'dd', 'div', 'dl', 'dt', 'fieldset', 'figcaption', 'figure', 'footer',
  'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'html', 'li',
  'main', 'nav', 'ol', 'p', 'pre', 'section', 'table', 'tbody', 'tfoot',
  'thead', 'tr', 'ul',
]);

const CELL_TAGS = new Set(['td', 'th']);

const HIDDEN_STYLE = /display\s*:\s*none/i;
const INVISIBLE_CHARS = /[\u200b\u200c\u200d\u2060\ufeff\u00ad]/g;

interface Block {
  text: string;
  inTable: boolean;
}

export function collapseWhitespace(text: string): string {
  return text.replace(INVISIBLE_CHARS, '').replace(/\s+/g, ' ').trim();
}

/**
 * Turns a raw filing into plain text with one paragraph per visible block.
 * The output depends only on the input, so it is safe to cache by filing id.
 */
export function normalizeFiling(raw: RawFiling): NormalizedDocument {
  const source = decode(raw);
  const blocks = raw.contentType === 'html' ? blocksFromHtml(source) : blocksFromText(source);

  const hasProse = blocks.some((b) => !b.inTable && /\p{L}/u.test(b.text));
  if (!hasProse) {
    throw new MalformedDocumentError(
      blocks.length === 0
        ? 'No extractable text after stripping markup'
        : 'Filing only contains tabular text',
      { company: raw.id.company, fiscalYear: raw.id.fiscalYear, sourceUrl: raw.sourceUrl }
    );
  }

  return buildDocument(raw.id, blocks.map((b) => b.text));
}

/** Normalizes plain text. Applying it to a normalized document's text returns that text unchanged. */
export function normalizeText(text: string): string {
  return blocksFromText(text)
    .map((b) => b.text)
    .join(PARAGRAPH_SEPARATOR);
}

export function buildDocument(id: FilingId, paragraphs: string[]): NormalizedDocument {
  const spans: ParagraphSpan[] = [];
  let offset = 0;
  for (const p of paragraphs) {
    spans.push({ start: offset, end: offset + p.length });
    offset += p.length + PARAGRAPH_SEPARATOR.length;
  }
  return { id, text: paragraphs.join(PARAGRAPH_SEPARATOR), paragraphs: spans };
}

function decode(raw: RawFiling): string {
  if (typeof raw.content === 'string') return raw.content;
  try {
    return new TextDecoder(raw.encoding || 'utf-8').decode(raw.content);
  } catch (err) {
    throw new MalformedDocumentError(
      `Cannot decode filing with encoding "${raw.encoding}"`,
      { company: raw.id.company, fiscalYear: raw.id.fiscalYear },
      err
    );
  }
}

function blocksFromText(text: string): Block[] {
  return text
    .replace(/\r\n?/g, '\n')
    .split(/\n[^\S\n]*\n/)
    .map((p) => collapseWhitespace(p))
    .filter((p) => p.length > 0)
    .map((p) => ({ text: p, inTable: false }));
}

class BlockCollector {
  readonly blocks: Block[] = [];
  private parts: string[] = [];
  private tableDepth = 0;

  append(text: string): void {
    this.parts.push(text);
  }

  flush(): void {
    const text = collapseWhitespace(this.parts.join(''));
    this.parts = [];
    if (text.length > 0) {
      this.blocks.push({ text, inTable: this.tableDepth > 0 });
    }
  }

  enterTable(): void {
    this.tableDepth++;
  }

  leaveTable(): void {
    this.tableDepth--;
  }
}

function blocksFromHtml(html: string): Block[] {
  const $ = cheerio.load(html);
  const collector = new BlockCollector();
  for (const node of $.root().contents().toArray()) {
    walk(node, collector);
  }
  collector.flush();
  return collector.blocks;
}

function walk(node: AnyNode, out: BlockCollector): void {
  if (isText(node)) {
    out.append(node.data);
    return;
  }
  if (!isTag(node)) return;

  const name = node.name.toLowerCase();
  if (REMOVED_TAGS.has(name) || isHidden(node)) return;

  if (name === 'br') {
    out.flush();
    return;
  }

  const isBlock = BLOCK_TAGS.has(name);
  const isTable = name === 'table';

  if (isBlock) out.flush();
  if (isTable) out.enterTable();

  for (const child of node.children) {
    walk(child, out);
  }

  if (CELL_TAGS.has(name)) out.append(' ');
  if (isBlock) out.flush();
  if (isTable) out.leaveTable();
}

function isHidden(el: Element): boolean {
  const style = el.attribs.style;
  return style !== undefined && HIDDEN_STYLE.test(style);
}
