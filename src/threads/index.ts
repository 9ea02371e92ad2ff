/**
 * Thread Module
 *
 * Rebuilds threads from a flat post archive and renders each one as a
 * markdown document with its attachments renamed beside it.
 */

// Types
export type {
  MediaKind,
  UrlRef,
  MediaRef,
  PostRecord,
  Thread,
  ThreadFilters,
  AssembledThreads,
  RenderOptions,
  RenderedDocument,
  MediaRenameMap,
} from './types.js';

export {
  MEDIA_KINDS,
  DEFAULT_PROFILE_BASE_URL,
  DEFAULT_MAX_CHAIN_LENGTH,
  compareIds,
} from './types.js';

// Archive schema
export {
  rawArchiveEntrySchema,
  rawPostSchema,
  type RawArchiveEntry,
  type RawPost,
  type RawMediaEntity,
  type RawUrlEntity,
  type RawVideoVariant,
} from './archive-schema.js';

// Parser
export {
  parseRecord,
  parseRecords,
  selectVideoVariant,
  type ParseResult,
  type ParseRecordsResult,
  type FailurePolicy,
  type RecordParseError,
} from './record-parser.js';

// Assembler
export {
  buildThreads,
  filterRecords,
  followChain,
  linkChains,
  type FilteredRecords,
} from './thread-assembler.js';

// Renderer
export {
  renderDocument,
  renderFrontMatter,
  mergeThreadText,
  stripLeadingMentions,
  spliceReply,
  rewriteUrls,
  rewriteMentions,
  type MergedThread,
} from './document-renderer.js';

export {
  buildMediaCatalog,
  groupMedia,
  archiveMediaName,
  renderMediaTag,
  type MediaCatalog,
  type MediaGroup,
} from './media-catalog.js';

// Time
export {
  parseTimestamp,
  parseDateBound,
  assertTimeZone,
  formatIsoInZone,
  formatDateStamp,
  formatShortDate,
  formatClock,
} from './time.js';
