/**
 * Thread Assembler
 *
 * Filters records and links replies into linear chains keyed by root id.
 * Replies are indexed by the id they answer, one slot per parent: when two
 * replies answer the same post the later one replaces the earlier. Branching
 * conversations therefore come out as a single chain.
 */

import { logger } from '../config/index.js';
import { assertTimeZone } from './time.js';
import {
  DEFAULT_MAX_CHAIN_LENGTH,
  type AssembledThreads,
  type PostRecord,
  type Thread,
  type ThreadFilters,
} from './types.js';

export interface FilteredRecords {
  roots: Map<string, PostRecord>;
  replies: Map<string, PostRecord>;   // Keyed by the id being replied to
}

/**
 * Apply zone conversion, date bounds, retweet and bare-mention filters, then
 * split the survivors into roots and the parent-keyed reply map.
 */
export function filterRecords(
  records: readonly PostRecord[],
  filters: ThreadFilters = {}
): FilteredRecords {
  const timeZone = filters.timeZone ? assertTimeZone(filters.timeZone) : undefined;
  const after = filters.after?.getTime();
  const before = filters.before?.getTime();

  const roots = new Map<string, PostRecord>();
  const replies = new Map<string, PostRecord>();

  for (const source of records) {
    const record = timeZone ? { ...source, timeZone } : source;
    const created = record.created.getTime();

    if (after !== undefined && created <= after) continue;
    if (before !== undefined && created >= before) continue;
    if (record.isRetweet) continue;
    // A mention that answers nothing is conversation with others, not a thread
    if (record.isMention && !record.replyToId) continue;

    if (record.replyToId) {
      replies.set(record.replyToId, record);
    } else {
      roots.set(record.id, record);
    }
  }

  return { roots, replies };
}

/**
 * Follow the reply map from a root id, returning the chain in order.
 * Stops on a revisited id or at `maxChainLength` replies.
 */
export function followChain(
  rootId: string,
  replies: ReadonlyMap<string, PostRecord>,
  maxChainLength: number = DEFAULT_MAX_CHAIN_LENGTH
): PostRecord[] {
  const chain: PostRecord[] = [];
  const visited = new Set<string>([rootId]);
  let next = replies.get(rootId);

  while (next) {
    if (visited.has(next.id)) {
      logger.warn({ rootId, recordId: next.id }, 'Reply chain revisits a post, stopping');
      break;
    }
    if (chain.length >= maxChainLength) {
      logger.warn({ rootId, maxChainLength }, 'Reply chain exceeds maximum length, truncating');
      break;
    }
    visited.add(next.id);
    chain.push(next);
    next = replies.get(next.id);
  }

  return chain;
}

/**
 * Attach each root's chain, returning new root records.
 */
export function linkChains(
  filtered: FilteredRecords,
  maxChainLength: number = DEFAULT_MAX_CHAIN_LENGTH
): Map<string, Thread> {
  const threads = new Map<string, Thread>();

  for (const [id, root] of filtered.roots) {
    threads.set(id, { ...root, replies: followChain(id, filtered.replies, maxChainLength) });
  }

  return threads;
}

export function buildThreads(
  records: readonly PostRecord[],
  filters: ThreadFilters = {}
): AssembledThreads {
  const filtered = filterRecords(records, filters);
  const threads = linkChains(filtered, filters.maxChainLength);

  logger.info({
    records: records.length,
    threads: threads.size,
    replies: filtered.replies.size,
  }, 'Assembled threads');

  return { threads, replyCount: filtered.replies.size };
}
