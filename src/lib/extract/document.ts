import { readFile } from 'node:fs/promises';
import path from 'node:path';

import AdmZip from 'adm-zip';
import { XMLParser } from 'fast-xml-parser';

import { shouldLog } from '@/lib/env';
import {
  NotFoundError,
  UnsupportedDocumentError,
  isNodeError,
} from '@/lib/errors';

// Tried in order; schedules typed on older Windows machines arrive as cp1251.
const TEXT_ENCODINGS = ['utf-8', 'windows-1251', 'koi8-r'] as const;

export function decodeText(buffer: Uint8Array): string {
  for (const encoding of TEXT_ENCODINGS) {
    try {
      const text = new TextDecoder(encoding, { fatal: true }).decode(buffer);
      return text.replace(/^\uFEFF/, '');
    } catch (err) {
      if (!(err instanceof TypeError)) throw err;
      if (shouldLog()) {
        console.log(`[extract] input is not valid ${encoding}, trying next`);
      }
    }
  }
  return Buffer.from(buffer).toString('latin1');
}

type OrderedNode = Record<string, unknown>;

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function childrenOf(nodes: unknown, tag: string): unknown[] {
  if (!Array.isArray(nodes)) return [];
  const out: unknown[] = [];
  for (const node of nodes) {
    if (isOrderedNode(node) && tag in node) out.push(node[tag]);
  }
  return out;
}

function collectRunText(nodes: unknown, insideText = false): string {
  if (!Array.isArray(nodes)) return '';

  let out = '';
  for (const node of nodes) {
    if (!isOrderedNode(node)) continue;
    for (const [tag, value] of Object.entries(node)) {
      if (tag === ':@') continue;
      if (tag === '#text') {
        if (insideText) out += String(value);
        continue;
      }
      if (tag === 'w:tab') out += '\t';
      else if (tag === 'w:br' || tag === 'w:cr') out += '\n';
      else out += collectRunText(value, tag === 'w:t');
    }
  }
  return out;
}

/**
 * Text of the top-level body paragraphs of a DOCX document, one paragraph
 * per line, blank paragraphs skipped. Table contents are not included.
 */
export function extractDocxText(buffer: Buffer): string {
  const zip = new AdmZip(buffer);
  const entry = zip.getEntry('word/document.xml');
  if (!entry) {
    throw new Error('DOCX archive has no word/document.xml');
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: true,
    trimValues: false,
    parseTagValue: false,
  });
  const tree: unknown = parser.parse(entry.getData().toString('utf8'));

  const body = childrenOf(childrenOf(tree, 'w:document')[0], 'w:body')[0];
  return childrenOf(body, 'w:p')
    .map((paragraph) => collectRunText(paragraph))
    .filter((text) => text.trim().length > 0)
    .join('\n');
}

export async function extractText(filePath: string): Promise<string> {
  const ext = path.extname(filePath).toLowerCase();
  if (!['', '.txt', '.text', '.docx'].includes(ext)) {
    throw new UnsupportedDocumentError(filePath);
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (err) {
    if (isNodeError(err, 'ENOENT')) throw new NotFoundError(filePath);
    throw err;
  }

  if (ext === '.docx') return extractDocxText(buffer);
  return decodeText(buffer);
}
