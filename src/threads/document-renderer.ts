/**
 * Document Renderer
 *
 * Merges a thread into one markdown document: front matter, the root text and
 * each reply as a paragraph, short URLs and @handles turned into links, and
 * attachment placeholders replaced by the renamed media.
 * Rendering reads the thread and returns new values; records are not touched.
 */

import { buildMediaCatalog } from './media-catalog.js';
import { formatIsoInZone } from './time.js';
import {
  DEFAULT_PROFILE_BASE_URL,
  type MediaRef,
  type RenderOptions,
  type RenderedDocument,
  type Thread,
  type UrlRef,
} from './types.js';

const CONTINUATION = '...';
const MENTION_PATTERN = /@([a-zA-Z0-9_]{1,15})/g;

/**
 * Drop the run of @handles a reply starts with. The remainder of the text is
 * kept as written; a reply made only of mentions becomes empty.
 */
export function stripLeadingMentions(text: string): string {
  let rest = text;
  while (rest.startsWith('@')) {
    const token = /^\S+\s*/.exec(rest);
    if (!token) break;
    rest = rest.slice(token[0].length);
  }
  return rest;
}

/**
 * Append a reply to the running text. A paragraph ending in "..." followed by
 * a reply starting with "..." is joined into one paragraph with one ellipsis.
 */
export function spliceReply(running: string, reply: string): string {
  if (running.endsWith(`${CONTINUATION}\n`) && reply.startsWith(CONTINUATION)) {
    return running.slice(0, -1) + reply.slice(CONTINUATION.length) + '\n';
  }
  return running + '\n' + reply + '\n';
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replace short URLs with `[display](expanded)` in a single pass, so inserted
 * links are never rewritten again. A repeated short URL uses its first reference.
 */
export function rewriteUrls(text: string, urls: readonly UrlRef[]): string {
  const byShort = new Map<string, UrlRef>();
  for (const url of urls) {
    if (url.short && !byShort.has(url.short)) byShort.set(url.short, url);
  }
  if (byShort.size === 0) return text;

  const alternatives = [...byShort.keys()]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  const pattern = new RegExp(alternatives.join('|'), 'g');

  return text.replace(pattern, match => {
    const ref = byShort.get(match);
    return ref ? `[${ref.display}](${ref.expanded})` : match;
  });
}

export function rewriteMentions(text: string, profileBaseUrl: string = DEFAULT_PROFILE_BASE_URL): string {
  const base = profileBaseUrl.replace(/\/+$/, '');
  return text.replace(MENTION_PATTERN, (_match, handle: string) => `[@${handle}](${base}/${handle})`);
}

export function renderFrontMatter(thread: Thread, options: RenderOptions = {}): string[] {
  const lines = [
    '---',
    `title: ${JSON.stringify(thread.id)}`,
    `date: ${formatIsoInZone(thread.created, thread.timeZone)}`,
  ];
  if (options.author) {
    lines.push(`author: ${JSON.stringify(options.author)}`);
  }
  if (options.tag) {
    lines.push(`tags: [${JSON.stringify(options.tag)}]`);
  }
  lines.push('---');
  return lines;
}

export interface MergedThread {
  text: string;
  urls: UrlRef[];
  media: MediaRef[];
}

/**
 * Root text plus every reply, with the URLs and media of the whole thread in
 * encounter order.
 */
export function mergeThreadText(thread: Thread): MergedThread {
  let text = thread.text + '\n';
  const urls = [...thread.urls];
  const media = [...thread.media];

  for (const reply of thread.replies) {
    text = spliceReply(text, stripLeadingMentions(reply.text));
    urls.push(...reply.urls);
    media.push(...reply.media);
  }

  return { text, urls, media };
}

export function renderDocument(thread: Thread, options: RenderOptions = {}): RenderedDocument {
  const merged = mergeThreadText(thread);

  let body = rewriteUrls(merged.text, merged.urls);
  body = rewriteMentions(body, options.profileBaseUrl);

  const catalog = buildMediaCatalog(merged.media, { unsafeVideoEmbed: options.unsafeVideoEmbed });
  for (const [sourceUrl, block] of catalog.blocks) {
    if (!sourceUrl) continue;
    body = body.split(sourceUrl).join(block);
  }

  return {
    id: thread.id,
    text: [...renderFrontMatter(thread, options), body].join('\n'),
    mediaFiles: catalog.files,
  };
}
