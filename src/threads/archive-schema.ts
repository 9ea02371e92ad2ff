import { z } from 'zod';

/**
 * Shape of one entry of an account archive's post files
 * (`window.YTD.tweets.part0 = [ { "tweet": { ... } }, ... ]`).
 * Only the fields the export reads are declared; the rest are stripped.
 */

const numericString = z.union([z.string(), z.number()]).transform(v => String(v));

export const rawUrlEntitySchema = z.object({
  url: z.string(),
  display_url: z.string(),
  expanded_url: z.string(),
});

export const rawVideoVariantSchema = z.object({
  bitrate: numericString.optional(),
  content_type: z.string().optional(),
  url: z.string(),
});

export const rawMediaEntitySchema = z.object({
  type: z.string(),
  url: z.string(),
  media_url: z.string().optional(),
  media_url_https: z.string().optional(),
  video_info: z
    .object({
      variants: z.array(rawVideoVariantSchema).default([]),
    })
    .optional(),
});

export const rawPostSchema = z.object({
  id_str: z.string().optional(),
  id: numericString.optional(),
  full_text: z.string(),
  created_at: z.string(),
  in_reply_to_status_id_str: z.string().nullish(),
  entities: z
    .object({
      urls: z.array(rawUrlEntitySchema).default([]),
    })
    .default({}),
  extended_entities: z
    .object({
      media: z.array(rawMediaEntitySchema).default([]),
    })
    .optional(),
});

export const rawArchiveEntrySchema = z.object({
  tweet: rawPostSchema,
});

export type RawUrlEntity = z.infer<typeof rawUrlEntitySchema>;
export type RawVideoVariant = z.infer<typeof rawVideoVariantSchema>;
export type RawMediaEntity = z.infer<typeof rawMediaEntitySchema>;
export type RawPost = z.infer<typeof rawPostSchema>;
export type RawArchiveEntry = z.infer<typeof rawArchiveEntrySchema>;
