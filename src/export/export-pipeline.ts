/**
 * Export Pipeline
 *
 * Archive → records → threads → documents, newest thread first.
 *
 * Stages:
 * - Read: decode and validate every post file of the archive
 * - Parse: normalize entries, applying the failure policy
 * - Assemble: filter records and link reply chains
 * - Render + write: one document per thread, media copied beside it
 * - CSV: optional one-row-per-thread summary
 */

import fs from 'fs/promises';
import { env, logger } from '../config/index.js';
import { renderDocument } from '../threads/document-renderer.js';
import { parseRecords } from '../threads/record-parser.js';
import { buildThreads } from '../threads/thread-assembler.js';
import { assertTimeZone, parseDateBound } from '../threads/time.js';
import { compareIds, type RenderOptions, type ThreadFilters } from '../threads/types.js';
import { readArchive } from './archive-reader.js';
import { buildThreadRows, writeThreadCsv } from './csv-export.js';
import { writeThreadDocument } from './document-store.js';
import type { ExportOptions, ExportReport } from './types.js';

export class ExportPipeline {
  private readonly options: ExportOptions;

  constructor(options: ExportOptions) {
    this.options = options;
  }

  /**
   * Resolve filters before anything is read, so a bad date or zone fails fast.
   */
  private resolveFilters(): ThreadFilters {
    const { after, before, timeZone, maxChainLength } = this.options;
    if (timeZone) {
      assertTimeZone(timeZone);
    }
    return {
      after: after ? parseDateBound(after) : undefined,
      before: before ? parseDateBound(before) : undefined,
      timeZone: timeZone || undefined,
      maxChainLength: maxChainLength ?? env.MAX_CHAIN_LENGTH,
    };
  }

  private renderOptions(): RenderOptions {
    return {
      author: this.options.author,
      tag: this.options.tag,
      unsafeVideoEmbed: this.options.unsafeVideoEmbed ?? false,
      profileBaseUrl: this.options.profileBaseUrl ?? env.PROFILE_BASE_URL,
    };
  }

  async run(): Promise<ExportReport> {
    const startTime = Date.now();
    const filters = this.resolveFilters();
    const { archivePath, outputPath } = this.options;

    logger.info({ archivePath, outputPath }, 'Starting export');

    const entries = await readArchive(archivePath);
    const { records, skipped } = parseRecords(entries, this.options.failurePolicy ?? 'abort');
    const { threads, replyCount } = buildThreads(records, filters);

    await fs.mkdir(outputPath, { recursive: true });

    const ordered = [...threads.values()].sort((a, b) => compareIds(b.id, a.id));
    const renderOptions = this.renderOptions();
    let documentsWritten = 0;
    let mediaCopied = 0;

    for (const [index, thread] of ordered.entries()) {
      const document = renderDocument(thread, renderOptions);
      const written = await writeThreadDocument(thread, document, outputPath, archivePath);

      documentsWritten++;
      mediaCopied += written.mediaCopied;
      this.options.onProgress?.(index + 1, ordered.length, thread.id);

      logger.debug({ threadId: thread.id, documentPath: written.documentPath }, 'Wrote thread document');
    }

    let csvRows = 0;
    if (this.options.csvPath) {
      const rows = buildThreadRows(threads, { username: this.options.username });
      await writeThreadCsv(this.options.csvPath, rows);
      csvRows = rows.length;
    }

    return this.buildReport(startTime, {
      recordsLoaded: entries.length,
      threadsFound: threads.size,
      repliesFound: replyCount,
      documentsWritten,
      mediaCopied,
      csvRows,
      skippedRecords: skipped.map(error => ({ recordId: error.recordId, reason: error.message })),
    });
  }

  private buildReport(
    startTime: number,
    counts: Pick<
      ExportReport,
      'recordsLoaded' | 'threadsFound' | 'repliesFound' | 'documentsWritten' | 'mediaCopied' | 'csvRows' | 'skippedRecords'
    >
  ): ExportReport {
    const report: ExportReport = {
      startedAt: new Date(startTime).toISOString(),
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - startTime,
      recordsLoaded: counts.recordsLoaded,
      recordsSkipped: counts.skippedRecords.length,
      threadsFound: counts.threadsFound,
      repliesFound: counts.repliesFound,
      documentsWritten: counts.documentsWritten,
      mediaCopied: counts.mediaCopied,
      csvRows: counts.csvRows,
      skippedRecords: counts.skippedRecords,
    };

    logger.info({
      ...report,
      skippedRecords: report.skippedRecords.length,
    }, 'Export complete');

    return report;
  }
}

/**
 * Run an export with the given options.
 */
export async function runExport(options: ExportOptions): Promise<ExportReport> {
  const pipeline = new ExportPipeline(options);
  return pipeline.run();
}
