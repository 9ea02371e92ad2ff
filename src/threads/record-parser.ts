/**
 * Record Parser
 *
 * Turns validated archive entries into normalized post records.
 * Parsing returns a result value; the caller's failure policy decides whether
 * an invalid record aborts the run or is skipped.
 */

import { logger } from '../config/index.js';
import { InvalidRecordError, UnsupportedMediaError } from '../errors.js';
import type { RawArchiveEntry, RawMediaEntity, RawPost } from './archive-schema.js';
import { parseTimestamp } from './time.js';
import type { MediaKind, MediaRef, PostRecord, UrlRef } from './types.js';

export type RecordParseError = UnsupportedMediaError | InvalidRecordError;

export type ParseResult =
  | { ok: true; record: PostRecord }
  | { ok: false; error: RecordParseError };

export type FailurePolicy = 'abort' | 'skip';

export interface ParseRecordsResult {
  records: PostRecord[];
  skipped: RecordParseError[];
}

const DECIMAL_ID = /^\d+$/;

function resolveId(post: RawPost): string | undefined {
  const id = post.id_str ?? post.id;
  return id !== undefined && DECIMAL_ID.test(id) ? id : undefined;
}

function resolveReplyToId(post: RawPost): string | undefined {
  const target = post.in_reply_to_status_id_str;
  if (!target || !DECIMAL_ID.test(target) || BigInt(target) === 0n) {
    return undefined;
  }
  return target;
}

function isVideoKind(kind: string): kind is Exclude<MediaKind, 'photo'> {
  return kind === 'video' || kind === 'animated_gif';
}

/**
 * Pick the lowest-bitrate variant of a video or GIF.
 *
 * Product intent may be the highest bitrate; the lowest is what the export has
 * always produced, so changing it changes every exported media catalog.
 */
export function selectVideoVariant(media: RawMediaEntity): string | undefined {
  let selected: { bitrate: number; url: string } | undefined;

  for (const variant of media.video_info?.variants ?? []) {
    if (variant.bitrate === undefined) continue;
    const bitrate = Number(variant.bitrate);
    if (Number.isNaN(bitrate)) continue;
    // Equal bitrates: the later variant wins
    if (!selected || bitrate <= selected.bitrate) {
      selected = { bitrate, url: variant.url };
    }
  }

  return selected?.url;
}

function parseMedia(post: RawPost, ownerId: string): MediaRef[] | RecordParseError {
  const media: MediaRef[] = [];

  for (const entity of post.extended_entities?.media ?? []) {
    if (entity.type === 'photo') {
      const mediaUrl = entity.media_url_https ?? entity.media_url;
      if (!mediaUrl) {
        return new InvalidRecordError(ownerId, 'photo without media URL');
      }
      media.push({ sourceUrl: entity.url, mediaUrl, kind: 'photo', ownerId });
    } else if (isVideoKind(entity.type)) {
      const mediaUrl = selectVideoVariant(entity);
      if (!mediaUrl) {
        return new InvalidRecordError(ownerId, `${entity.type} without bitrate variants`);
      }
      media.push({ sourceUrl: entity.url, mediaUrl, kind: entity.type, ownerId });
    } else {
      return new UnsupportedMediaError(ownerId, entity.type);
    }
  }

  return media;
}

/**
 * Parse one archive entry into a record.
 */
export function parseRecord(entry: RawArchiveEntry): ParseResult {
  const post = entry.tweet;
  const id = resolveId(post);
  if (!id) {
    return { ok: false, error: new InvalidRecordError(String(post.id_str ?? post.id ?? '?'), 'missing numeric id') };
  }

  const created = parseTimestamp(post.created_at);
  if (!created) {
    return { ok: false, error: new InvalidRecordError(id, `unparseable timestamp "${post.created_at}"`) };
  }

  const media = parseMedia(post, id);
  if (!Array.isArray(media)) {
    return { ok: false, error: media };
  }

  const urls: UrlRef[] = post.entities.urls.map(u => ({
    short: u.url,
    display: u.display_url,
    expanded: u.expanded_url,
  }));

  const text = post.full_text;

  return {
    ok: true,
    record: {
      id,
      text,
      created,
      timeZone: 'UTC',
      replyToId: resolveReplyToId(post),
      isRetweet: text.startsWith('RT @'),
      isMention: text.startsWith('@'),
      urls,
      media,
      replies: [],
    },
  };
}

/**
 * Parse every entry, applying the failure policy to invalid ones.
 * Under `abort` the first error is thrown and nothing is returned.
 */
export function parseRecords(
  entries: readonly RawArchiveEntry[],
  policy: FailurePolicy = 'abort'
): ParseRecordsResult {
  const records: PostRecord[] = [];
  const skipped: RecordParseError[] = [];

  for (const entry of entries) {
    const result = parseRecord(entry);
    if (result.ok) {
      records.push(result.record);
      continue;
    }

    if (policy === 'abort') {
      throw result.error;
    }

    logger.warn({ recordId: result.error.recordId, code: result.error.code }, result.error.message);
    skipped.push(result.error);
  }

  logger.debug({ parsed: records.length, skipped: skipped.length }, 'Parsed archive records');

  return { records, skipped };
}
