/**
 * CSV Export
 *
 * One row per thread, newest first, for reviewing an export in a spreadsheet,
 * and the reader for CSV files edited during that review.
 */

import fs from 'fs/promises';
import { logger } from '../config/index.js';
import { stripLeadingMentions } from '../threads/document-renderer.js';
import { formatClock, formatShortDate } from '../threads/time.js';
import { compareIds, type Thread } from '../threads/types.js';
import type { ThreadRow } from './types.js';

export const CSV_HEADER = ['id', 'date', 'time', 'replies', 'media', 'link', 'body'] as const;

/**
 * Root text and every reply, each on its own paragraph. No continuation
 * splicing or link rewriting.
 */
export function threadPlainText(thread: Thread): string {
  let text = thread.text + '\n';
  for (const reply of thread.replies) {
    text += '\n' + stripLeadingMentions(reply.text) + '\n';
  }
  return text;
}

export function buildThreadRows(
  threads: ReadonlyMap<string, Thread>,
  options: { username?: string } = {}
): ThreadRow[] {
  const username = options.username ?? '';

  return [...threads.values()]
    .sort((a, b) => compareIds(b.id, a.id))
    .map(thread => ({
      id: thread.id,
      date: formatShortDate(thread.created, thread.timeZone),
      time: formatClock(thread.created, thread.timeZone),
      replies: thread.replies.length,
      media: thread.media.length + thread.replies.reduce((sum, r) => sum + r.media.length, 0),
      link: `https://x.com/${username}/status/${thread.id}`,
      body: threadPlainText(thread),
    }));
}

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsv(rows: readonly ThreadRow[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const row of rows) {
    lines.push(CSV_HEADER.map(column => escapeCsvField(row[column])).join(','));
  }
  return lines.map(line => line + '\r\n').join('');
}

export async function writeThreadCsv(filePath: string, rows: readonly ThreadRow[]): Promise<void> {
  await fs.writeFile(filePath, formatCsv(rows), 'utf-8');
  logger.info({ filePath, rows: rows.length }, 'Wrote thread CSV');
}

/**
 * Split CSV text into rows of fields. Quoted fields may hold separators,
 * doubled quotes and line breaks; rows end at LF or CRLF.
 */
export function parseCsv(content: string): string[][] {
  const text = content.replace(/^\uFEFF/, '');
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (quoted) {
      if (char !== '"') {
        field += char;
      } else if (text[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        quoted = false;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}
