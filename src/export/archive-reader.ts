/**
 * Archive Reader
 *
 * Reads the post files of an account archive. Each file is a script that
 * assigns a JSON array to a global (`window.YTD.tweets.part0 = [...]`);
 * large archives split the posts over `tweets.js`, `tweets-part1.js`, ...
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../config/index.js';
import { ArchiveFormatError } from '../errors.js';
import { rawArchiveEntrySchema, type RawArchiveEntry } from '../threads/archive-schema.js';

const ARCHIVE_FILE_PATTERN = /^tweets(?:-part(\d+))?\.js$/;
const ASSIGNMENT_PREFIX = /^\s*window\.YTD\.[\w.]+\s*=\s*/;

export function archiveDataPath(archiveDir: string): string {
  return path.join(archiveDir, 'data');
}

export function archiveMediaPath(archiveDir: string, fileName: string): string {
  return path.join(archiveDataPath(archiveDir), 'tweets_media', fileName);
}

/**
 * Strip the variable assignment and parse the JSON payload.
 */
export function decodeArchiveScript(content: string, source = 'archive'): unknown {
  const payload = content.replace(ASSIGNMENT_PREFIX, '');
  try {
    return JSON.parse(payload);
  } catch (error) {
    throw new ArchiveFormatError(`${source}: not a JSON array assignment`, { cause: error });
  }
}

export function validateArchiveEntries(data: unknown, source = 'archive'): RawArchiveEntry[] {
  if (!Array.isArray(data)) {
    throw new ArchiveFormatError(`${source}: expected an array of posts`);
  }

  return data.map((item: unknown, index) => {
    const result = rawArchiveEntrySchema.safeParse(item);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : result.error.message;
      throw new ArchiveFormatError(`${source}: entry ${index}: ${where}`);
    }
    return result.data;
  });
}

function partNumber(fileName: string): number {
  const match = ARCHIVE_FILE_PATTERN.exec(fileName);
  return match?.[1] ? Number(match[1]) : 0;
}

/**
 * Post files of the archive in part order.
 */
export async function listArchiveFiles(archiveDir: string): Promise<string[]> {
  const dataDir = archiveDataPath(archiveDir);
  let names: string[];
  try {
    names = await fs.readdir(dataDir);
  } catch (error) {
    throw new ArchiveFormatError(`Archive data directory not readable: ${dataDir}`, { cause: error });
  }

  const files = names
    .filter(name => ARCHIVE_FILE_PATTERN.test(name))
    .sort((a, b) => partNumber(a) - partNumber(b))
    .map(name => path.join(dataDir, name));

  if (files.length === 0) {
    throw new ArchiveFormatError(`No post files found in ${dataDir}`);
  }
  return files;
}

export async function readArchiveFile(filePath: string): Promise<RawArchiveEntry[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const entries = validateArchiveEntries(decodeArchiveScript(content, filePath), filePath);

  logger.debug({ filePath, entries: entries.length }, 'Read archive file');
  return entries;
}

/**
 * Read every post entry of the archive.
 */
export async function readArchive(archiveDir: string): Promise<RawArchiveEntry[]> {
  const files = await listArchiveFiles(archiveDir);
  const entries: RawArchiveEntry[] = [];

  for (const file of files) {
    entries.push(...(await readArchiveFile(file)));
  }

  logger.info({ archiveDir, files: files.length, entries: entries.length }, 'Read archive');
  return entries;
}
