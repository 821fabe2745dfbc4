/**
 * Filesystem document source
 *
 * Walks a directory tree for supported documents and extracts their text.
 * Unreadable files are logged and skipped, never thrown.
 */

import { readdir, stat } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import pino from 'pino';
import type { DiscoverOptions, DocumentDescriptor, DocumentSource, LoadedDocument } from '@kexp/core';
import { EXTRACTORS, SUPPORTED_EXTENSIONS } from './formats.js';
import type { FileSystemSourceOptions } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const DEFAULT_IGNORED = ['node_modules', 'dist', 'build'];

export class FileSystemDocumentSource implements DocumentSource {
  private readonly maxFileSizeBytes: number;
  private readonly ignored: ReadonlySet<string>;

  constructor(options: FileSystemSourceOptions = {}) {
    this.maxFileSizeBytes = (options.maxFileSizeMb ?? 50) * 1024 * 1024;
    this.ignored = new Set(options.ignoredDirectories ?? DEFAULT_IGNORED);
  }

  async *discover(root: string, options: DiscoverOptions): AsyncGenerator<DocumentDescriptor> {
    const rootPath = resolve(root);

    try {
      const rootStats = await stat(rootPath);
      if (!rootStats.isDirectory()) {
        logger.error({ event: 'source.discover.not_directory', root: rootPath }, 'Path is not a directory');
        return;
      }
    } catch (error: unknown) {
      logger.error(
        { event: 'source.discover.missing', root: rootPath, error: error instanceof Error ? error.message : String(error) },
        'Directory does not exist'
      );
      return;
    }

    const extensions = new Set(options.extensions);
    yield* this.walk(rootPath, options.recursive, extensions);
  }

  private async *walk(dir: string, recursive: boolean, extensions: ReadonlySet<string>): AsyncGenerator<DocumentDescriptor> {
    const entries = await readdir(dir, { withFileTypes: true }).catch((error: unknown) => {
      logger.error(
        { event: 'source.discover.read_dir_fail', dir, error: error instanceof Error ? error.message : String(error) },
        'Error reading directory'
      );
      return null;
    });
    if (!entries) return;

    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      // Hidden files and folders
      if (entry.name.startsWith('.')) continue;

      const fullPath = join(dir, entry.name);

      if (entry.isDirectory()) {
        if (recursive && !this.ignored.has(entry.name)) {
          yield* this.walk(fullPath, recursive, extensions);
        }
        continue;
      }

      if (!entry.isFile()) continue;

      const fileType = extname(entry.name).toLowerCase();
      if (!extensions.has(fileType)) continue;

      const descriptor = await this.describe(fullPath, fileType);
      if (descriptor) {
        yield descriptor;
      }
    }
  }

  private async describe(filePath: string, fileType: string): Promise<DocumentDescriptor | null> {
    try {
      const stats = await stat(filePath);
      if (stats.size > this.maxFileSizeBytes) {
        logger.warn({ event: 'source.discover.too_large', filePath, size: stats.size }, 'File too large, skipping');
        return null;
      }

      return {
        filePath,
        filename: basename(filePath),
        fileSize: stats.size,
        fileType,
        mimeType: SUPPORTED_EXTENSIONS[fileType] ?? null,
        createdAt: stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime,
        modifiedAt: stats.mtime,
      };
    } catch (error: unknown) {
      logger.error(
        { event: 'source.discover.stat_fail', filePath, error: error instanceof Error ? error.message : String(error) },
        'Error accessing file'
      );
      return null;
    }
  }

  async load(descriptor: DocumentDescriptor): Promise<LoadedDocument> {
    const extractor = EXTRACTORS[descriptor.fileType];
    if (!extractor) {
      logger.warn(
        { event: 'source.load.unsupported', filePath: descriptor.filePath, fileType: descriptor.fileType },
        'No text extractor for file type'
      );
      return { ...descriptor, content: '' };
    }

    try {
      return { ...descriptor, content: await extractor(descriptor.filePath) };
    } catch (error: unknown) {
      logger.error(
        { event: 'source.load.fail', filePath: descriptor.filePath, error: error instanceof Error ? error.message : String(error) },
        'Error loading document content'
      );
      return { ...descriptor, content: '' };
    }
  }
}
