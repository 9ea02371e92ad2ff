/**
 * Media Catalog
 *
 * Groups a thread's attachments by the placeholder URL that appears in the
 * text, assigns each group the next sequential index and renames every
 * variant to `<index>.<ext>` beside the rendered document.
 */

import path from 'path';
import type { MediaRef, MediaRenameMap } from './types.js';

export interface MediaGroup {
  sourceUrl: string;
  variants: MediaRef[];
}

export interface MediaCatalog {
  files: MediaRenameMap;
  blocks: Map<string, string>;   // sourceUrl → markdown replacing it
}

export interface MediaCatalogOptions {
  unsafeVideoEmbed?: boolean;
}

/**
 * Name of the attachment inside the archive's media folder:
 * `<ownerId>-<last path segment of the media URL>`.
 */
export function archiveMediaName(ref: MediaRef): string {
  const segment = ref.mediaUrl.split('#')[0].split('?')[0].split('/').pop() ?? '';
  return `${ref.ownerId}-${segment}`;
}

export function groupMedia(media: readonly MediaRef[]): MediaGroup[] {
  const groups = new Map<string, MediaGroup>();

  for (const ref of media) {
    const group = groups.get(ref.sourceUrl);
    if (group) {
      group.variants.push(ref);
    } else {
      groups.set(ref.sourceUrl, { sourceUrl: ref.sourceUrl, variants: [ref] });
    }
  }

  return [...groups.values()];
}

export function renderMediaTag(ref: MediaRef, fileName: string, unsafeVideoEmbed = false): string {
  if (ref.kind === 'video' || ref.kind === 'animated_gif') {
    return unsafeVideoEmbed
      ? `<video src='${fileName}' controls></video>`
      : `[Video](${fileName})`;
  }
  return `[![](${fileName})](${fileName})`;
}

function targetName(index: number, extension: string, occurrence: number): string {
  const stem = occurrence === 0 ? String(index) : `${index}-${occurrence + 1}`;
  return extension ? `${stem}.${extension}` : stem;
}

export function buildMediaCatalog(
  media: readonly MediaRef[],
  options: MediaCatalogOptions = {}
): MediaCatalog {
  const files: MediaRenameMap = new Map();
  const blocks = new Map<string, string>();

  groupMedia(media).forEach((group, position) => {
    const index = position + 1;
    const extensionUse = new Map<string, number>();
    const tags: string[] = [];

    for (const ref of group.variants) {
      const original = archiveMediaName(ref);
      if (files.has(original)) continue;

      const extension = path.extname(original).slice(1);
      const occurrence = extensionUse.get(extension) ?? 0;
      extensionUse.set(extension, occurrence + 1);

      const renamed = targetName(index, extension, occurrence);
      files.set(original, renamed);
      tags.push(renderMediaTag(ref, renamed, options.unsafeVideoEmbed));
    }

    blocks.set(group.sourceUrl, '\n\n' + tags.join('\n'));
  });

  return { files, blocks };
}
