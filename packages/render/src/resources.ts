/**
 * @module resources
 * Resolve external images referenced by a document.
 *
 * Local references (relative paths, absolute paths, `file:` URLs) are read
 * from disk and inlined as data URIs, so the markup renders the same no
 * matter what the process working directory is. Relative references need a
 * resources directory; remote URLs are never fetched.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from '@svgview/types';
import { describeError, silentLogger } from '@svgview/core';

/** `<image>` and `<feImage>` start tags. */
const IMAGE_TAG = /<(?:image|feImage)\b(?:[^>"']|"[^"]*"|'[^']*')*>/g;

/** `href` or `xlink:href` attribute inside a tag. */
const HREF_ATTR = /(\s(?:xlink:)?href\s*=\s*)(?:"([^"]*)"|'([^']*)')/;

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.svgz': 'image/svg+xml',
};

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
};

function decodeXmlEntities(value: string): string {
  return value.replace(/&(?:amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

/**
 * Map an image reference to a file on disk.
 * @returns The absolute path, or null when the reference is remote, inline,
 *   or relative without a resources directory.
 */
export function resolveResourcePath(href: string, resourcesDir: string | null): string | null {
  const trimmed = href.trim();
  if (trimmed === '' || trimmed.startsWith('#')) return null;
  if (/^data:/i.test(trimmed)) return null;
  if (/^file:/i.test(trimmed)) {
    try {
      return fileURLToPath(trimmed);
    } catch {
      return null;
    }
  }
  // Any other scheme (http:, https:, ...) is remote. Windows drive letters are not schemes.
  if (/^[a-z][a-z0-9+.-]+:/i.test(trimmed) && !/^[a-z]:[\\/]/i.test(trimmed)) return null;

  let decoded = trimmed;
  try {
    decoded = decodeURIComponent(trimmed);
  } catch {
    // Keep the raw reference when it is not valid percent-encoding.
  }
  if (path.isAbsolute(decoded)) return decoded;
  if (resourcesDir === null) return null;
  return path.resolve(resourcesDir, decoded);
}

/** Pick a MIME type from the file extension, falling back to the leading bytes. */
export function imageMimeType(filePath: string, bytes: Uint8Array): string {
  const byExtension = MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()];
  if (byExtension) return byExtension;

  const startsWith = (...signature: number[]): boolean =>
    signature.every((byte, i) => bytes[i] === byte);
  if (startsWith(0x89, 0x50, 0x4e, 0x47)) return 'image/png';
  if (startsWith(0xff, 0xd8, 0xff)) return 'image/jpeg';
  if (startsWith(0x47, 0x49, 0x46, 0x38)) return 'image/gif';
  if (startsWith(0x52, 0x49, 0x46, 0x46) && String.fromCharCode(...bytes.subarray(8, 12)) === 'WEBP') {
    return 'image/webp';
  }
  return 'image/svg+xml';
}

/** Result of {@link inlineImageResources}. */
export interface InlinedResources {
  markup: string;
  /** References that were replaced, as written in the markup. */
  inlined: string[];
}

/**
 * Replace local image references with data URIs.
 * References that cannot be resolved are left as they are.
 */
export async function inlineImageResources(
  markup: string,
  resourcesDir: string | null,
  logger: Logger = silentLogger,
): Promise<InlinedResources> {
  const dataUris = new Map<string, string>();

  for (const tag of markup.match(IMAGE_TAG) ?? []) {
    const attr = HREF_ATTR.exec(tag);
    if (!attr) continue;
    const href = decodeXmlEntities(attr[2] ?? attr[3] ?? '');
    if (dataUris.has(href) || /^data:/i.test(href.trim())) continue;

    const filePath = resolveResourcePath(href, resourcesDir);
    if (filePath === null) {
      logger.debug(`not resolving image reference ${href}`);
      continue;
    }
    try {
      const bytes = await fs.promises.readFile(filePath);
      dataUris.set(href, `data:${imageMimeType(filePath, bytes)};base64,${bytes.toString('base64')}`);
    } catch (error) {
      logger.warn(`Could not load image ${href}: ${describeError(error)}`);
    }
  }

  if (dataUris.size === 0) return { markup, inlined: [] };

  const rewritten = markup.replace(IMAGE_TAG, (tag) =>
    tag.replace(HREF_ATTR, (whole, prefix: string, double?: string, single?: string) => {
      const uri = dataUris.get(decodeXmlEntities(double ?? single ?? ''));
      return uri === undefined ? whole : `${prefix}"${uri}"`;
    }),
  );
  return { markup: rewritten, inlined: Array.from(dataUris.keys()) };
}
