/**
 * Export Types
 */

import type { FailurePolicy } from '../threads/record-parser.js';

export interface ExportOptions {
  archivePath: string;
  outputPath: string;

  // Filters (strings as given on the command line)
  after?: string;
  before?: string;
  timeZone?: string;

  // Rendering
  author?: string;
  tag?: string;
  unsafeVideoEmbed?: boolean;
  profileBaseUrl?: string;
  maxChainLength?: number;

  // Tabular export
  csvPath?: string;
  username?: string;

  // Behavior
  failurePolicy?: FailurePolicy;

  // Callbacks
  onProgress?: (current: number, total: number, threadId: string) => void;
}

export interface WrittenDocument {
  id: string;
  documentPath: string;
  mediaCopied: number;
}

/**
 * Export run report.
 */
export interface ExportReport {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  recordsLoaded: number;
  recordsSkipped: number;
  threadsFound: number;
  repliesFound: number;
  documentsWritten: number;
  mediaCopied: number;
  csvRows: number;
  skippedRecords: Array<{
    recordId: string;
    reason: string;
  }>;
}

export interface ThreadRow {
  id: string;
  date: string;
  time: string;
  replies: number;
  media: number;
  link: string;
  body: string;
}

/**
 * One reviewed row of a category fix file.
 */
export interface CategoryFix {
  id: string;                // Document id (`<YYYYMMDD>-<postId>`) or bare post id
  category: string;
  flags: string[];
}

export type CategoryChange =
  | { kind: 'draft'; documentId: string; category: string }
  | { kind: 'move'; documentId: string; from: string; to: string };

export interface CategoryFixOptions {
  postsPath: string;         // One folder per category
  fixes: ReadonlyMap<string, CategoryFix>;
  apply?: boolean;           // Without it nothing is written
  onChange?: (change: CategoryChange) => void;
}

export interface CategorySummary {
  category: string;
  documents: number;
  drafts: number;
  moved: number;
}

export interface CategoryFixReport {
  startedAt: string;
  completedAt: string;
  durationMs: number;
  applied: boolean;
  documentsScanned: number;
  drafts: number;
  moved: number;
  categories: CategorySummary[];
}
