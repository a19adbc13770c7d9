import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { ParsedDocumentSchema, type ParsedDocument } from '../schemas/document.js';
import { DocumentParseError } from '../utils/errors.js';

/**
 * Read and validate one canonical document file.
 *
 * @throws DocumentParseError when the file is not JSON or not a valid document
 */
export async function readDocumentFile(path: string): Promise<ParsedDocument> {
  const raw = await readFile(path, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DocumentParseError(`Malformed JSON in ${path}: ${message}`, { path });
  }

  const parsed = ParsedDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new DocumentParseError(`Invalid document ${path}: ${issues.join('; ')}`, { path, issues });
  }
  return parsed.data;
}

/** Pretty JSON, two-space indent, non-ASCII text written as-is. */
export function serializeDocument(document: ParsedDocument): string {
  return JSON.stringify(document, null, 2);
}

export async function writeDocumentFile(path: string, document: ParsedDocument): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeDocument(document), 'utf-8');
}

/**
 * File-backed store holding one `{docId}.json` per document.
 */
export class DocumentStore {
  readonly storeDir: string;

  constructor(storeDir: string) {
    this.storeDir = resolve(storeDir);
  }

  pathFor(docId: string): string {
    return join(this.storeDir, `${docId}.json`);
  }

  async exists(docId: string): Promise<boolean> {
    try {
      const fileStat = await stat(this.pathFor(docId));
      return fileStat.isFile();
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  async read(docId: string): Promise<ParsedDocument> {
    return readDocumentFile(this.pathFor(docId));
  }

  async write(document: ParsedDocument): Promise<string> {
    const path = this.pathFor(document.metadata.doc_id);
    await writeDocumentFile(path, document);
    return path;
  }

  /** Stage marker of a stored document, or undefined when it is not stored yet. */
  async getStage(docId: string): Promise<string | undefined> {
    if (!(await this.exists(docId))) {
      return undefined;
    }
    const document = await this.read(docId);
    return document.metadata.parse_stage;
  }
}
