/**
 * markup-tree — Tree-query helpers
 *
 * Read-only lookups over built trees. Nested sequences are transparent:
 * the children of `<ul>` built from `[tag('ul'), build(items.map(...))]` are
 * found as if they had been listed directly. Names compare case-insensitively.
 *
 * Tolerance contract
 * ──────────────────
 * • A `null` or `undefined` argument returns the neutral value for that
 *   function (`""`, `undefined`, `[]`).
 */

import { toText } from './render.ts';
import { isElement, isSentinel, isSequence, isUnsafeText } from './types.ts';
import type { AttributeValue, Element, Node, Sequence } from './types.ts';

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Elements among `nodes`, looking through nested sequences but not into elements. */
function collectElements(nodes: Sequence, out: Element[]): Element[] {
	for (const node of nodes) {
		if (isElement(node)) out.push(node);
		else if (isSequence(node)) collectElements(node, out);
	}
	return out;
}

function hasName(el: Element, name: string): boolean {
	return el.name.toLowerCase() === name.toLowerCase();
}

/** Top-level elements of `node`: its children for an element, its members for a sequence. */
function elementsUnder(node: Node): Element[] {
	if (isElement(node)) return collectElements(node.children, []);
	if (isSequence(node)) return collectElements(node, []);
	return [];
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Concatenated text of a tree, the way it reads with all markup removed.
 *
 * - string → itself (unescaped).
 * - Element / Sequence → children concatenated.
 * - UnsafeText → its raw value.
 * - Sentinel, `null`, `undefined` → `""`.
 * - Other atoms and `Renderable` values → their text form.
 */
export function textContent(node: Node): string {
	if (node == null) return '';
	if (typeof node === 'string') return node;
	if (isSequence(node)) return node.map(textContent).join('');
	if (isElement(node)) return textContent(node.children);
	if (isUnsafeText(node)) return node.value;
	if (isSentinel(node)) return '';
	return toText(node);
}

/** All direct child elements of `el`, through nested sequences. */
export function childElements(el: Element | null | undefined): Element[] {
	if (el == null) return [];
	return elementsUnder(el);
}

/** First direct child element of `el` named `name`. */
export function child(el: Element | null | undefined, name: string): Element | undefined {
	return childElements(el).find((c) => hasName(c, name));
}

/**
 * First element named `name` anywhere below `node` (an element or a
 * sequence). Depth-first, pre-order; `node` itself is not a candidate.
 */
export function descendant(node: Node, name: string): Element | undefined {
	if (node == null) return undefined;
	for (const item of elementsUnder(node)) {
		if (hasName(item, name)) return item;
		const found = descendant(item, name);
		if (found !== undefined) return found;
	}
	return undefined;
}

/** All elements named `name` anywhere below `node`. Depth-first, pre-order. */
export function descendants(node: Node, name: string): Element[] {
	if (node == null) return [];
	const results: Element[] = [];
	for (const item of elementsUnder(node)) {
		if (hasName(item, name)) results.push(item);
		results.push(...descendants(item, name));
	}
	return results;
}

/**
 * Value of the first attribute of `el` named `name`, as stored (not
 * rendered). Returns `undefined` when there is no such attribute.
 */
export function attr(el: Element | null | undefined, name: string): AttributeValue {
	if (el == null) return undefined;
	const key = name.toLowerCase();
	return el.attributes.find((a) => a.name.toLowerCase() === key)?.value;
}
