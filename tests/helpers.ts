import { rawArchiveEntrySchema, type RawArchiveEntry } from "../src/threads/archive-schema.js";
import type { MediaRef, PostRecord } from "../src/threads/types.js";

export const ARCHIVE_TIMESTAMP = "Wed Oct 10 20:19:24 +0000 2018";

/**
 * Archive entry as it appears in `tweets.js`, validated through the schema.
 */
export function makeEntry(tweet: Record<string, unknown>): RawArchiveEntry {
  return rawArchiveEntrySchema.parse({
    tweet: {
      id_str: "1",
      full_text: "hello",
      created_at: ARCHIVE_TIMESTAMP,
      entities: { urls: [] },
      ...tweet,
    },
  });
}

export function makeRecord(overrides: Partial<PostRecord> & { id: string }): PostRecord {
  const text = overrides.text ?? `post ${overrides.id}`;
  return {
    text,
    created: new Date("2020-01-01T00:00:00Z"),
    timeZone: "UTC",
    isRetweet: text.startsWith("RT @"),
    isMention: text.startsWith("@"),
    urls: [],
    media: [],
    replies: [],
    ...overrides,
  };
}

export function makeMedia(overrides: Partial<MediaRef> = {}): MediaRef {
  return {
    sourceUrl: "https://t.co/media",
    mediaUrl: "https://pbs.twimg.com/media/Photo.jpg",
    kind: "photo",
    ownerId: "1",
    ...overrides,
  };
}
