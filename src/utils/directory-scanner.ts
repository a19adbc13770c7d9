import { readdir, stat } from 'fs/promises';
import { join, extname, basename, normalize } from 'path';
import { SOURCE_FILE_NAMES } from './constants.js';

export interface DocumentDirInfo {
  docId: string;
  dirPath: string;
}

export interface StoredDocumentInfo {
  docId: string;
  filePath: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface SkippedEntry {
  name: string;
  reason: string;
}

export interface DocumentDirScanResult {
  documents: DocumentDirInfo[];
  skipped: SkippedEntry[];
  directoryPath: string;
}

export interface JsonStoreScanResult {
  documents: StoredDocumentInfo[];
  skipped: SkippedEntry[];
  directoryPath: string;
}

function isHidden(name: string): boolean {
  return name.startsWith('.') || name.startsWith('~$');
}

/**
 * Scans a conversion work directory for per-document subdirectories.
 * The subdirectory name is the document id. Directories without the fused
 * content stream are reported as skipped. Sorted by id for deterministic processing.
 */
export async function scanDocumentDirectories(directoryPath: string): Promise<DocumentDirScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const documents: DocumentDirInfo[] = [];
  const skipped: SkippedEntry[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }

    const name = entry.name;
    if (isHidden(name)) {
      skipped.push({ name, reason: 'Hidden directory' });
      continue;
    }

    const dirPath = join(normalizedPath, name);
    const children = await readdir(dirPath);
    if (!children.includes(SOURCE_FILE_NAMES.PRIMARY)) {
      skipped.push({ name, reason: `Missing ${SOURCE_FILE_NAMES.PRIMARY}` });
      continue;
    }

    documents.push({ docId: name, dirPath });
  }

  documents.sort((a, b) => a.docId.localeCompare(b.docId));

  return {
    documents,
    skipped,
    directoryPath: normalizedPath,
  };
}

/**
 * Scans the document store for `{docId}.json` files, skipping temporary and zero-byte files.
 */
export async function scanJsonStore(directoryPath: string): Promise<JsonStoreScanResult> {
  const normalizedPath = normalize(directoryPath);
  const entries = await readdir(normalizedPath, { withFileTypes: true });

  const documents: StoredDocumentInfo[] = [];
  const skipped: SkippedEntry[] = [];

  for (const entry of entries) {
    if (entry.isDirectory()) {
      continue;
    }

    const name = entry.name;
    if (extname(name).toLowerCase() !== '.json') {
      continue;
    }

    if (isHidden(name)) {
      skipped.push({ name, reason: 'Temporary file (starts with ~$ or .)' });
      continue;
    }

    const filePath = join(normalizedPath, name);
    const fileStat = await stat(filePath);

    if (fileStat.size === 0) {
      skipped.push({ name, reason: 'Zero-byte file' });
      continue;
    }

    documents.push({
      docId: basename(name, extname(name)),
      filePath,
      sizeBytes: fileStat.size,
      modifiedAt: fileStat.mtime,
    });
  }

  documents.sort((a, b) => a.docId.localeCompare(b.docId));

  return {
    documents,
    skipped,
    directoryPath: normalizedPath,
  };
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Validates that a directory exists and is accessible.
 */
export async function validateDirectory(directoryPath: string): Promise<{ valid: boolean; error?: string }> {
  try {
    const normalizedPath = normalize(directoryPath);
    const dirStat = await stat(normalizedPath);

    if (!dirStat.isDirectory()) {
      return { valid: false, error: `Path is not a directory: ${normalizedPath}` };
    }

    return { valid: true };
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      return { valid: false, error: `Directory does not exist: ${directoryPath}` };
    }
    if (code === 'EACCES') {
      return { valid: false, error: `Permission denied: ${directoryPath}` };
    }
    return { valid: false, error: `Cannot access directory: ${directoryPath}` };
  }
}
