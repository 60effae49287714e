/**
 * Image Processor for Deck Exporter
 * Finds image references in note HTML, exports the files and points the
 * references at the exported copies.
 */

import { join } from 'path';
import type { MediaFetcher } from './media-fetcher.js';

export const IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'svg', 'webp'] as const;

/**
 * src="photo.jpg" or src='photo.jpg'
 */
const IMAGE_SRC_REGEX = new RegExp(`src=["']([^"']+\\.(?:${IMAGE_EXTENSIONS.join('|')}))["']`, 'gi');

/**
 * Distinct image filenames referenced by the fragment, in order of first appearance.
 * The captured path is kept exactly as written.
 */
export function extractImages(html: string): string[] {
  const fileNames = new Set<string>();
  for (const match of html.matchAll(IMAGE_SRC_REGEX)) {
    fileNames.add(match[1]);
  }
  return [...fileNames];
}

export function exportedMediaPath(fileName: string, mediaSubfolder: string): string {
  return `../media/${mediaSubfolder}/${fileName}`;
}

/**
 * Rewrites every src="name" and src='name' in the whole fragment, not only the
 * tag the name was found in.
 */
export function replaceImagesWithPaths(html: string, fileNames: string[], mediaSubfolder: string): string {
  let result = html;

  for (const fileName of fileNames) {
    const replacement = `src="${exportedMediaPath(fileName, mediaSubfolder)}"`;
    // Replacer functions, so '$&' and friends in a filename stay literal
    result = result
      .replaceAll(`src="${fileName}"`, () => replacement)
      .replaceAll(`src='${fileName}'`, () => replacement);
  }

  return result;
}

/**
 * Exports the images of one field and returns the rewritten HTML.
 * References are rewritten even when the file could not be retrieved.
 */
export async function processImagesInHtml(
  html: string,
  mediaSubfolder: string,
  mediaBaseDir: string,
  fetcher: MediaFetcher
): Promise<string> {
  const fileNames = extractImages(html);
  if (fileNames.length === 0) {
    return html;
  }

  const targetDir = join(mediaBaseDir, mediaSubfolder);
  for (const fileName of fileNames) {
    await fetcher.fetch(fileName, targetDir);
  }

  return replaceImagesWithPaths(html, fileNames, mediaSubfolder);
}
