/**
 * Supported file types and their content extractors
 */

import { readFile } from 'fs/promises';
import mammoth from 'mammoth';
import sanitizeHtml from 'sanitize-html';
import { extractText, getDocumentProxy } from 'unpdf';
import type { ContentExtractor } from './types.js';

export const SUPPORTED_EXTENSIONS: Readonly<Record<string, string>> = {
  '.txt': 'text/plain',
  '.md': 'text/markdown',
  '.pdf': 'application/pdf',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.doc': 'application/msword',
  '.rtf': 'application/rtf',
  '.html': 'text/html',
  '.htm': 'text/html',
};

/**
 * Turn user input such as "pdf,.MD" into lower-case dotted extensions;
 * empty input means every supported extension
 */
export function normalizeExtensions(types: readonly string[] | undefined): string[] {
  const cleaned = (types ?? [])
    .map((type) => type.trim().toLowerCase().replace(/^\.+/, ''))
    .filter((type) => type.length > 0)
    .map((type) => `.${type}`);

  if (cleaned.length === 0) {
    return Object.keys(SUPPORTED_EXTENSIONS);
  }
  return [...new Set(cleaned)];
}

/**
 * UTF-8 when the bytes are valid, Latin-1 otherwise
 */
export function decodeText(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
}

export function htmlToText(html: string): string {
  const text = sanitizeHtml(html, {
    allowedTags: [],
    allowedAttributes: {},
    nonTextTags: ['style', 'script', 'textarea', 'option', 'noscript', 'head'],
  });
  return text
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

const loadText: ContentExtractor = async (filePath) => decodeText(await readFile(filePath));

const loadHtml: ContentExtractor = async (filePath) => htmlToText(decodeText(await readFile(filePath)));

const loadDocx: ContentExtractor = async (filePath) => {
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
};

/**
 * Page text in order, one newline after each page
 */
const loadPdf: ContentExtractor = async (filePath) => {
  const pdf = await getDocumentProxy(new Uint8Array(await readFile(filePath)));
  const { text } = await extractText(pdf, { mergePages: false });
  return text.map((page) => `${page}\n`).join('');
};

/**
 * Extractors by extension; types without one load as empty content
 */
export const EXTRACTORS: Readonly<Record<string, ContentExtractor>> = {
  '.txt': loadText,
  '.md': loadText,
  '.html': loadHtml,
  '.htm': loadHtml,
  '.pdf': loadPdf,
  '.docx': loadDocx,
};
