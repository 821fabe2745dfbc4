/**
 * Unit tests for the filesystem document source
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { copyFile, mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import type { DocumentDescriptor } from '@kexp/core';
import { FileSystemDocumentSource } from './source.js';
import { decodeText, htmlToText, normalizeExtensions } from './formats.js';

async function collect(iterable: AsyncIterable<DocumentDescriptor>): Promise<DocumentDescriptor[]> {
  const items: DocumentDescriptor[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

describe('FileSystemDocumentSource', () => {
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'kexp-source-'));
    await writeFile(join(root, 'a.md'), '# Runbook\nRotate keys yearly.');
    await writeFile(join(root, 'b.txt'), 'Plain notes');
    await writeFile(join(root, '.hidden.md'), 'secret');
    await writeFile(join(root, 'image.png'), 'not a document');
    await mkdir(join(root, 'node_modules'));
    await writeFile(join(root, 'node_modules', 'dep.md'), 'vendored');
    await mkdir(join(root, 'sub'));
    await writeFile(
      join(root, 'sub', 'c.html'),
      '<html>\n<body>\n<h1>Policy</h1>\n<p>Valid   until 2020</p>\n<script>track()</script>\n</body>\n</html>'
    );
    await copyFile(fileURLToPath(new URL('./__fixtures__/expiry-note.pdf', import.meta.url)), join(root, 'sub', 'scan.pdf'));
    await writeFile(join(root, 'sub', 'broken.pdf'), '%PDF-1.4');
  });

  afterAll(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('walks the tree in name order, skipping hidden and ignored entries', async () => {
    const source = new FileSystemDocumentSource();
    const found = await collect(source.discover(root, { recursive: true, extensions: normalizeExtensions([]) }));

    expect(found.map((d) => d.filename)).toEqual(['a.md', 'b.txt', 'broken.pdf', 'c.html', 'scan.pdf']);
    expect(found[0]).toMatchObject({ fileType: '.md', mimeType: 'text/markdown', fileSize: 29 });
  });

  it('stays at the top level when not recursive', async () => {
    const source = new FileSystemDocumentSource();
    const found = await collect(source.discover(root, { recursive: false, extensions: ['.md', '.txt', '.html'] }));
    expect(found.map((d) => d.filename)).toEqual(['a.md', 'b.txt']);
  });

  it('filters by extension', async () => {
    const source = new FileSystemDocumentSource();
    const found = await collect(source.discover(root, { recursive: true, extensions: normalizeExtensions(['HTML']) }));
    expect(found.map((d) => d.filename)).toEqual(['c.html']);
  });

  it('skips files over the size limit', async () => {
    const source = new FileSystemDocumentSource({ maxFileSizeMb: 0 });
    const found = await collect(source.discover(root, { recursive: true, extensions: ['.md'] }));
    expect(found).toEqual([]);
  });

  it('yields nothing for a missing directory', async () => {
    const source = new FileSystemDocumentSource();
    const found = await collect(source.discover(join(root, 'missing'), { recursive: true, extensions: ['.md'] }));
    expect(found).toEqual([]);
  });

  it('loads text and html content', async () => {
    const source = new FileSystemDocumentSource();
    const [markdown, , , html] = await collect(
      source.discover(root, { recursive: true, extensions: normalizeExtensions([]) })
    );
    if (!markdown || !html) throw new Error('expected documents');

    expect((await source.load(markdown)).content).toBe('# Runbook\nRotate keys yearly.');
    expect((await source.load(html)).content).toBe('Policy\nValid until 2020');
  });

  it('extracts pdf text and loads an unreadable pdf as empty', async () => {
    const source = new FileSystemDocumentSource();
    const [broken, scan] = await collect(source.discover(join(root, 'sub'), { recursive: false, extensions: ['.pdf'] }));
    if (!broken || !scan) throw new Error('expected documents');

    expect((await source.load(scan)).content).toContain('Kubernetes 1.18 manifests are still required.');
    expect((await source.load(broken)).content).toBe('');
  });

  it('returns empty content when the file vanished', async () => {
    const source = new FileSystemDocumentSource();
    const loaded = await source.load({
      filePath: join(root, 'gone.md'),
      filename: 'gone.md',
      fileSize: 0,
      fileType: '.md',
      mimeType: 'text/markdown',
      createdAt: null,
      modifiedAt: null,
    });
    expect(loaded.content).toBe('');
  });
});

describe('normalizeExtensions', () => {
  it('lower-cases, dots and de-duplicates', () => {
    expect(normalizeExtensions(['pdf', '.MD', ' md ', ''])).toEqual(['.pdf', '.md']);
  });

  it('defaults to every supported type', () => {
    expect(normalizeExtensions(undefined)).toEqual(['.txt', '.md', '.pdf', '.docx', '.doc', '.rtf', '.html', '.htm']);
  });
});

describe('decodeText', () => {
  it('falls back to latin1 for invalid utf-8', () => {
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe('café');
  });
});

describe('htmlToText', () => {
  it('drops style blocks and tags', () => {
    expect(htmlToText('<style>p{}</style><p>Hello <b>world</b></p>')).toBe('Hello world');
  });
});
