import fs from 'fs/promises';
import path from 'path';
import matter from 'gray-matter';
import { dump, load } from 'js-yaml';
import { logger } from '../config/index.js';
import { MediaCopyError } from '../errors.js';
import { formatDateStamp } from '../threads/time.js';
import type { RenderedDocument, Thread } from '../threads/types.js';
import { archiveMediaPath } from './archive-reader.js';
import type { WrittenDocument } from './types.js';

export interface ThreadDocument {
  filePath: string;          // Markdown file
  path: string;              // Directory for bundled documents, the file otherwise
  singleFile: boolean;
  id: string;                // `<YYYYMMDD>-<postId>`
  postId: string;
  date?: Date;
  metadata: DocumentMetadata;
  body: string;
}

export interface DocumentMetadata {
  title?: unknown;
  date?: unknown;
  author?: unknown;
  tags?: unknown;
  [key: string]: unknown;
}

const DOCUMENT_NAME = /^(\d{8})-(\d+)$/;
const INDEX_FILE = 'index.md';

/**
 * Output name of a thread: `<YYYYMMDD>-<id>` in the root's zone.
 */
export function documentBaseName(thread: Thread): string {
  return `${formatDateStamp(thread.created, thread.timeZone)}-${thread.id}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Front matter is read and written with the same YAML implementation
function parseYaml(source: string): Record<string, unknown> {
  const value = load(source);
  return isRecord(value) ? value : {};
}

function toDate(value: unknown): Date | undefined {
  if (value instanceof Date) return value;
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Write a rendered thread. Threads with media become a folder holding
 * `index.md` and the renamed attachments copied from the archive.
 */
export async function writeThreadDocument(
  thread: Thread,
  document: RenderedDocument,
  outputDir: string,
  archiveDir: string
): Promise<WrittenDocument> {
  const baseName = documentBaseName(thread);

  if (document.mediaFiles.size === 0) {
    const documentPath = path.join(outputDir, `${baseName}.md`);
    await fs.writeFile(documentPath, document.text, 'utf-8');
    return { id: thread.id, documentPath, mediaCopied: 0 };
  }

  const documentDir = path.join(outputDir, baseName);
  await fs.mkdir(documentDir, { recursive: true });

  for (const [original, renamed] of document.mediaFiles) {
    const source = archiveMediaPath(archiveDir, original);
    const target = path.join(documentDir, renamed);
    try {
      await fs.copyFile(source, target);
    } catch (error) {
      throw new MediaCopyError(source, target, error);
    }
  }

  const documentPath = path.join(documentDir, INDEX_FILE);
  await fs.writeFile(documentPath, document.text, 'utf-8');
  return { id: thread.id, documentPath, mediaCopied: document.mediaFiles.size };
}

/**
 * Load one rendered document.
 */
export async function loadThreadDocument(filePath: string): Promise<ThreadDocument> {
  const content = await fs.readFile(filePath, 'utf-8');
  const parsed = matter(content, { engines: { yaml: parseYaml } });
  const metadata: DocumentMetadata = { ...parsed.data };

  const singleFile = path.basename(filePath) !== INDEX_FILE;
  const documentPath = singleFile ? filePath : path.dirname(filePath);
  const id = singleFile
    ? path.basename(filePath, path.extname(filePath))
    : path.basename(documentPath);
  const postId = DOCUMENT_NAME.exec(id)?.[2] ?? id;

  return {
    filePath,
    path: documentPath,
    singleFile,
    id,
    postId,
    date: toDate(metadata.date),
    metadata,
    body: parsed.content,
  };
}

/**
 * Write a loaded document's metadata and body back to its markdown file.
 */
export async function saveThreadDocument(document: ThreadDocument): Promise<void> {
  const frontMatter = dump(document.metadata, { lineWidth: 1000, skipInvalid: true });
  await fs.writeFile(document.filePath, `---\n${frontMatter}---\n${document.body}`, 'utf-8');
}

/**
 * Move a document (its file, or its whole folder) into `targetDir`.
 */
export async function moveThreadDocument(document: ThreadDocument, targetDir: string): Promise<ThreadDocument> {
  await fs.mkdir(targetDir, { recursive: true });

  const movedPath = path.join(targetDir, path.basename(document.path));
  await fs.rename(document.path, movedPath);

  return {
    ...document,
    path: movedPath,
    filePath: document.singleFile ? movedPath : path.join(movedPath, INDEX_FILE),
  };
}

/**
 * Load every document in an output directory: `<name>.md` files and
 * `<name>/index.md` folders. A file path loads just that file.
 */
export async function loadThreadDocuments(target: string): Promise<ThreadDocument[]> {
  const stat = await fs.stat(target);
  if (stat.isFile()) {
    return [await loadThreadDocument(target)];
  }

  const entries = await fs.readdir(target, { withFileTypes: true });
  const documents: ThreadDocument[] = [];

  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const entryPath = path.join(target, entry.name);
    if (entry.isDirectory()) {
      const indexPath = path.join(entryPath, INDEX_FILE);
      try {
        await fs.access(indexPath);
      } catch {
        continue;
      }
      documents.push(await loadThreadDocument(indexPath));
    } else if (entry.isFile() && path.extname(entry.name) === '.md') {
      documents.push(await loadThreadDocument(entryPath));
    }
  }

  logger.debug({ target, documents: documents.length }, 'Loaded thread documents');
  return documents;
}
