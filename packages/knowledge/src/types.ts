/**
 * Types for filesystem document discovery and loading
 */

export interface FileSystemSourceOptions {
  /** Files larger than this are skipped during discovery */
  maxFileSizeMb?: number;
  /** Directory names never descended into */
  ignoredDirectories?: readonly string[];
}

export type ContentExtractor = (filePath: string) => Promise<string>;
