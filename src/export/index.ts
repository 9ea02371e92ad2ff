/**
 * Export Module
 *
 * File-system side of the export: reading the archive, writing documents
 * and media, the CSV summary, loading written documents back and applying
 * reviewed category fixes to them.
 */

export type {
  CategoryChange,
  CategoryFix,
  CategoryFixOptions,
  CategoryFixReport,
  CategorySummary,
  ExportOptions,
  ExportReport,
  ThreadRow,
  WrittenDocument,
} from './types.js';

// Reader
export {
  readArchive,
  readArchiveFile,
  listArchiveFiles,
  decodeArchiveScript,
  validateArchiveEntries,
  archiveDataPath,
  archiveMediaPath,
} from './archive-reader.js';

// Documents
export {
  writeThreadDocument,
  loadThreadDocument,
  loadThreadDocuments,
  saveThreadDocument,
  moveThreadDocument,
  documentBaseName,
  type DocumentMetadata,
  type ThreadDocument,
} from './document-store.js';

// CSV
export {
  buildThreadRows,
  formatCsv,
  escapeCsvField,
  threadPlainText,
  writeThreadCsv,
  parseCsv,
  CSV_HEADER,
} from './csv-export.js';

// Category fixes
export {
  CategoryFixer,
  runCategoryFixes,
  readCategoryFixes,
  parseCategoryFixes,
  replaceCategoryTag,
} from './category-fixes.js';

// Pipeline
export {
  ExportPipeline,
  runExport,
} from './export-pipeline.js';
