/**
 * Thread Types
 *
 * Normalized post records and the threads assembled from them.
 * Post ids are kept as decimal strings: they exceed the safe integer range.
 */

export type MediaKind = 'photo' | 'video' | 'animated_gif';

export const MEDIA_KINDS: readonly MediaKind[] = ['photo', 'video', 'animated_gif'];

/**
 * Shortened URL occurring inline in a post's text.
 */
export interface UrlRef {
  readonly short: string;
  readonly display: string;
  readonly expanded: string;
}

/**
 * One attachment variant. Several variants of the same attachment share
 * the `sourceUrl` placeholder that appears in the post text.
 */
export interface MediaRef {
  readonly sourceUrl: string;
  readonly mediaUrl: string;
  readonly kind: MediaKind;
  readonly ownerId: string;
}

export interface PostRecord {
  readonly id: string;
  readonly text: string;
  readonly created: Date;
  readonly timeZone: string;       // IANA zone `created` is presented in
  readonly replyToId?: string;
  readonly isRetweet: boolean;
  readonly isMention: boolean;
  readonly urls: readonly UrlRef[];
  readonly media: readonly MediaRef[];
  readonly replies: readonly PostRecord[];   // Only populated on thread roots
}

/**
 * A root record whose `replies` hold the linear reply chain.
 */
export type Thread = PostRecord;

export interface ThreadFilters {
  after?: Date;
  before?: Date;
  timeZone?: string;
  maxChainLength?: number;
}

export interface AssembledThreads {
  threads: Map<string, Thread>;
  replyCount: number;
}

export interface RenderOptions {
  author?: string;
  tag?: string;
  unsafeVideoEmbed?: boolean;
  profileBaseUrl?: string;
}

/**
 * Original media filename → renamed filename beside the document.
 */
export type MediaRenameMap = Map<string, string>;

export interface RenderedDocument {
  id: string;
  text: string;
  mediaFiles: MediaRenameMap;
}

export const DEFAULT_PROFILE_BASE_URL = 'http://x.com';
export const DEFAULT_MAX_CHAIN_LENGTH = 10_000;

/**
 * Numeric ordering for decimal id strings.
 */
export function compareIds(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
}
