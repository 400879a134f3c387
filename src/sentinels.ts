/**
 * markup-tree — Sentinel atoms and void elements
 *
 * Sentinels are fixed-form atoms registered once by name. The registry only
 * grows; an existing entry is never replaced.
 */

import type { Sentinel } from './types.ts';

const registry = new Map<string, Sentinel>();

/**
 * Register a fixed-form atom that renders as `literal` (followed by the
 * line break) wherever it appears in a tree.
 *
 * Defining the same name twice with the same literal returns the existing
 * sentinel.
 *
 * @throws {TypeError} When `name` is already bound to a different literal.
 */
export function defineSentinel(name: string, literal: string): Sentinel {
	const existing = registry.get(name);
	if (existing !== undefined) {
		if (existing.literal !== literal) {
			throw new TypeError(`Sentinel "${name}" is already defined as ${JSON.stringify(existing.literal)}`);
		}
		return existing;
	}
	const sentinel: Sentinel = { type: 'sentinel', name, literal };
	Object.freeze(sentinel);
	registry.set(name, sentinel);
	return sentinel;
}

/** The sentinel registered under `name`, or `undefined`. */
export function sentinelNamed(name: string): Sentinel | undefined {
	return registry.get(name);
}

/** The HTML5 document-type preamble. */
export const DOCTYPE = defineSentinel('doctype', '<!doctype html>');

// ---------------------------------------------------------------------------
// Void elements
// ---------------------------------------------------------------------------

/** Elements rendered without a closing tag by default. Every other element gets a close tag, even when empty. */
export const VOID_ELEMENTS: ReadonlySet<string> = new Set(['input']);

/** The full HTML void element list, for `RenderOptions.voidElements`. */
export const HTML_VOID_ELEMENTS: ReadonlySet<string> = new Set(['area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input', 'link', 'meta', 'param', 'source', 'track', 'wbr']);

/** Case-insensitive membership test against `voids` (`VOID_ELEMENTS` by default). */
export function isVoidElement(name: string, voids: ReadonlySet<string> = VOID_ELEMENTS): boolean {
	return voids.has(name.toLowerCase());
}
