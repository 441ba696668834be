/**
 * @module fit
 * Map a document onto a target pixel size.
 *
 * `stretch` rewrites the document element's start tag so the renderer paints the
 * whole viewBox into exactly width × height, ignoring aspect ratio.
 * `contain` keeps the aspect ratio and lets the renderer scale by the
 * limiting axis.
 */

import type { ResvgRenderOptions } from '@resvg/resvg-js';
import type { Size } from '@svgview/types';

/** The `fitTo` member of resvg's render options. */
export type FitTo = NonNullable<ResvgRenderOptions['fitTo']>;

/**
 * Start tag of an `svg` element, optionally namespace-prefixed, anchored at
 * `lastIndex`. Attribute values may contain `>` inside quotes.
 */
const ROOT_ELEMENT = /<(?:[A-Za-z_][\w.-]*:)?svg(?=[\s/>])(?:[^>"']|"[^"]*"|'[^']*')*>/y;

/** Attributes that decide the rendered size and aspect. */
const SIZING_ATTRS = /\s(?:width|height|preserveAspectRatio)\s*=\s*(?:"[^"]*"|'[^']*')/g;

const VIEWBOX_ATTR = /\sviewBox\s*=/;

interface RootTag {
  index: number;
  tag: string;
}

function skipPast(markup: string, terminator: string, from: number): number {
  const at = markup.indexOf(terminator, from);
  return at < 0 ? -1 : at + terminator.length;
}

/** End of a `<!DOCTYPE ...>` declaration, including any internal subset. */
function skipDeclaration(markup: string, from: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = from; i < markup.length; i++) {
    const ch = markup[i];
    if (quote !== null) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      depth--;
    } else if (ch === '>' && depth <= 0) {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Locate the document element's start tag, stepping over the prolog,
 * comments and CDATA. Null when the first element is not `svg`.
 */
function findRootTag(markup: string): RootTag | null {
  let pos = 0;
  while (pos >= 0) {
    const open = markup.indexOf('<', pos);
    if (open < 0) return null;
    if (markup.startsWith('<!--', open)) {
      pos = skipPast(markup, '-->', open + 4);
    } else if (markup.startsWith('<?', open)) {
      pos = skipPast(markup, '?>', open + 2);
    } else if (markup.startsWith('<![CDATA[', open)) {
      pos = skipPast(markup, ']]>', open + 9);
    } else if (markup.startsWith('<!', open)) {
      pos = skipDeclaration(markup, open + 2);
    } else {
      ROOT_ELEMENT.lastIndex = open;
      const match = ROOT_ELEMENT.exec(markup);
      return match ? { index: open, tag: match[0] } : null;
    }
  }
  return null;
}

function formatNumber(value: number): string {
  return String(Number(value.toFixed(4)));
}

/**
 * Rewrite the root element to render at exactly `target`.
 *
 * The root gets `width`/`height` set to the target and
 * `preserveAspectRatio="none"`. A document without a `viewBox` gets one
 * spanning its natural size so that its content still scales.
 * Markup whose document element is not `svg` is returned unchanged.
 */
export function stretchMarkup(markup: string, natural: Size, target: Size): string {
  const root = findRootTag(markup);
  if (!root) return markup;

  const { index, tag } = root;
  const selfClosing = tag.endsWith('/>');
  const attrs = tag.slice(0, selfClosing ? -2 : -1).replace(SIZING_ATTRS, '').trimEnd();
  const viewBox = VIEWBOX_ATTR.test(attrs)
    ? ''
    : ` viewBox="0 0 ${formatNumber(natural.width)} ${formatNumber(natural.height)}"`;
  const rewritten =
    `${attrs} width="${target.width}" height="${target.height}"${viewBox}` +
    ` preserveAspectRatio="none"${selfClosing ? '/>' : '>'}`;

  return markup.slice(0, index) + rewritten + markup.slice(index + tag.length);
}

/** Scale along the axis that runs out of room first. */
export function containFitTo(natural: Size, target: Size): FitTo {
  const scaleX = target.width / natural.width;
  const scaleY = target.height / natural.height;
  return scaleX <= scaleY
    ? { mode: 'width', value: target.width }
    : { mode: 'height', value: target.height };
}
