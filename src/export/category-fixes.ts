/**
 * Category Fixes
 *
 * Applies a reviewed `id,category,flags` CSV to an output tree that holds
 * one folder per category. A changed category replaces the old category tag
 * and moves the document into the new folder; a `draft` flag sets
 * `draft: true` in the front matter.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../config/index.js';
import { CsvFormatError } from '../errors.js';
import { parseCsv } from './csv-export.js';
import {
  loadThreadDocuments,
  moveThreadDocument,
  saveThreadDocument,
  type DocumentMetadata,
  type ThreadDocument,
} from './document-store.js';
import type { CategoryFix, CategoryFixOptions, CategoryFixReport, CategorySummary } from './types.js';

const DRAFT_FLAG = 'draft';

export function parseCategoryFixes(content: string, source = 'fixes'): Map<string, CategoryFix> {
  const [header, ...rows] = parseCsv(content);
  if (!header) {
    throw new CsvFormatError(`${source}: empty file`);
  }

  const columns = header.map(name => name.trim());
  const idColumn = columns.indexOf('id');
  const categoryColumn = columns.indexOf('category');
  const flagsColumn = columns.indexOf('flags');
  if (idColumn < 0 || categoryColumn < 0) {
    throw new CsvFormatError(`${source}: expected "id" and "category" columns`);
  }

  const fixes = new Map<string, CategoryFix>();
  for (const [index, row] of rows.entries()) {
    if (row.length === 1 && row[0].trim() === '') continue;

    const id = (row[idColumn] ?? '').trim();
    const category = (row[categoryColumn] ?? '').trim();
    if (!id || !category) {
      throw new CsvFormatError(`${source}: line ${index + 2}: id and category are required`);
    }

    const flags = (flagsColumn < 0 ? '' : row[flagsColumn] ?? '')
      .split(',')
      .map(flag => flag.trim())
      .filter(flag => flag.length > 0);
    fixes.set(id, { id, category, flags });
  }

  return fixes;
}

export async function readCategoryFixes(csvPath: string): Promise<Map<string, CategoryFix>> {
  const content = await fs.readFile(csvPath, 'utf-8');
  const fixes = parseCategoryFixes(content, csvPath);
  logger.debug({ csvPath, fixes: fixes.size }, 'Loaded category fixes');
  return fixes;
}

/**
 * Drop `from` from the tag list and append `to`.
 */
export function replaceCategoryTag(tags: unknown, from: string, to: string): unknown[] {
  const kept = Array.isArray(tags) ? tags.filter(tag => tag !== from) : [];
  return [...kept, to];
}

export class CategoryFixer {
  private readonly options: CategoryFixOptions;

  constructor(options: CategoryFixOptions) {
    this.options = options;
  }

  async run(): Promise<CategoryFixReport> {
    const startTime = Date.now();
    const { postsPath } = this.options;

    const entries = await fs.readdir(postsPath, { withFileTypes: true });
    const categories = entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort((a, b) => a.localeCompare(b));

    // Everything is loaded before anything moves, so a moved document is
    // not visited again under its new category.
    const loaded: Array<[string, ThreadDocument[]]> = [];
    for (const category of categories) {
      loaded.push([category, await loadThreadDocuments(path.join(postsPath, category))]);
    }

    const summaries: CategorySummary[] = [];
    for (const [category, documents] of loaded) {
      summaries.push(await this.fixCategory(category, documents));
    }

    return this.buildReport(startTime, summaries);
  }

  private async fixCategory(category: string, documents: readonly ThreadDocument[]): Promise<CategorySummary> {
    const { postsPath, fixes, apply = false, onChange } = this.options;
    const summary: CategorySummary = { category, documents: documents.length, drafts: 0, moved: 0 };

    for (const document of documents) {
      const fix = fixes.get(document.id) ?? fixes.get(document.postId);
      if (!fix) continue;

      let metadata: DocumentMetadata = document.metadata;
      const draft = fix.flags.includes(DRAFT_FLAG);
      const move = fix.category !== category;

      if (draft) {
        metadata = { ...metadata, draft: true };
        summary.drafts++;
        onChange?.({ kind: 'draft', documentId: document.id, category });
      }
      if (move) {
        metadata = { ...metadata, tags: replaceCategoryTag(metadata.tags, category, fix.category) };
        summary.moved++;
        onChange?.({ kind: 'move', documentId: document.id, from: category, to: fix.category });
      }

      if (!apply || (!draft && !move)) continue;

      await saveThreadDocument({ ...document, metadata });
      if (move) {
        await moveThreadDocument(document, path.join(postsPath, fix.category));
      }
    }

    logger.info(summary, 'Fixed category');
    return summary;
  }

  private buildReport(startTime: number, categories: CategorySummary[]): CategoryFixReport {
    const report: CategoryFixReport = {
      startedAt: new Date(startTime).toISOString(),
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - startTime,
      applied: this.options.apply ?? false,
      documentsScanned: categories.reduce((sum, c) => sum + c.documents, 0),
      drafts: categories.reduce((sum, c) => sum + c.drafts, 0),
      moved: categories.reduce((sum, c) => sum + c.moved, 0),
      categories,
    };

    logger.info({ ...report, categories: categories.length }, 'Category fixes complete');
    return report;
  }
}

/**
 * Apply category fixes to an output tree.
 */
export async function runCategoryFixes(options: CategoryFixOptions): Promise<CategoryFixReport> {
  const fixer = new CategoryFixer(options);
  return fixer.run();
}
