/**
 * markup-tree
 *
 * Build markup as ordinary data, render it to text later with escaping
 * applied at the last moment.
 *
 * Quick start
 * ───────────
 * ```ts
 * import { build, renderToText, tag, DOCTYPE } from 'markup-tree';
 *
 * const page = build([
 * 	DOCTYPE,
 * 	[tag('html'),
 * 		[tag('body'),
 * 			[[tag('p'), 'class', 'note'], 'Fish & chips'],
 * 			[[tag('input'), 'type', 'checkbox', 'checked', true]]]],
 * ]);
 *
 * renderToText(page, { lineBreak: '' });
 * // '<!doctype html><html><body><p class="note">Fish &amp; chips</p>'
 * // + '<input type="checkbox" checked="checked"></body></html>'
 * ```
 */

// Builder and error class
export { build, html, tag, BuildError } from './build.ts';
export type { Description, DescriptionList } from './build.ts';

// Writer, entry points and error class
export { write, renderToText, renderToStream, StringSink, RenderError } from './render.ts';
export type { RenderOptions } from './render.ts';

// Escape-only API
export { escape, escapeChar } from './escape.ts';

// Sentinels and void elements
export { DOCTYPE, defineSentinel, sentinelNamed, VOID_ELEMENTS, HTML_VOID_ELEMENTS, isVoidElement } from './sentinels.ts';

// All node types, constructors and type guards
export type { NodeType, Atom, Renderable, UnsafeText, Sentinel, AttributeValue, Attribute, Element, Node, Sequence, Tag, Sink } from './types.ts';

export { element, unsafe, isElement, isUnsafeText, isSentinel, isTag, isSequence, isRenderable } from './types.ts';

// Tree-query helpers
export { textContent, childElements, child, descendant, descendants, attr } from './query.ts';
