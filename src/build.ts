/**
 * markup-tree — Declarative builder
 *
 * Turns a nested description into a tree in one recursive descent.
 *
 * Grammar
 * ────────
 * • `tag('p')`                               → `<p></p>` (no attributes, no children)
 * • `[tag('p'), ...children]`                → element; children built recursively
 * • `[[tag('a'), 'href', '/x', ...], ...children]`
 *                                            → element with attribute pairs in order
 * • any other array                          → plain data; members built recursively,
 *                                              returned as a Sequence
 * • anything else (atoms, prebuilt nodes)    → passed through unchanged
 *
 * Nothing is escaped here; escaping happens only when the tree is rendered.
 */

import { element, isRenderable, isSentinel, isElement, isTag, isUnsafeText } from './types.ts';
import type { Attribute, AttributeValue, Node, Tag } from './types.ts';

// ---------------------------------------------------------------------------
// Description types
// ---------------------------------------------------------------------------

/** One item of a description: a node, a tag identifier, or a nested list. */
export type Description = Node | Tag | DescriptionList;

export type DescriptionList = ReadonlyArray<Description>;

// ---------------------------------------------------------------------------
// Public error type
// ---------------------------------------------------------------------------

/**
 * Thrown when a description cannot be turned into a tree, e.g. an attribute
 * list of odd length. The whole build is aborted.
 */
export class BuildError extends Error {
	/** Index path from the top-level item list to the offending entry. */
	readonly path: readonly number[];

	constructor(message: string, path: readonly number[]) {
		super(`${message} (at item ${path.join('.')})`);
		this.name = 'MalformedDescriptionError';
		this.path = path;
	}
}

// ---------------------------------------------------------------------------
// Tag identifiers
// ---------------------------------------------------------------------------

const tags = new Map<string, Tag>();

/**
 * The tag identifier for `name`. Names are case-insensitive, so
 * `tag('DIV') === tag('div')`. No validation is performed.
 *
 * Identifiers are interned for the life of the process; the table only
 * grows, one entry per distinct lower-cased name.
 */
export function tag(name: string): Tag {
	const key = name.toLowerCase();
	let found = tags.get(key);
	if (found === undefined) {
		found = { type: 'tag', name: key };
		Object.freeze(found);
		tags.set(key, found);
	}
	return found;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

interface TagHead {
	tag: Tag;
	attributes: DescriptionList;
}

function isList(value: Description): value is DescriptionList {
	return Array.isArray(value);
}

function isAttributeValue(value: Description): value is AttributeValue {
	if (value == null) return true;
	switch (typeof value) {
		case 'string':
		case 'number':
		case 'bigint':
		case 'boolean':
			return true;
	}
	return !isList(value) && !isTag(value) && !isElement(value) && !isUnsafeText(value) && !isSentinel(value) && isRenderable(value);
}

/** Splits the head of a tag form, or returns `undefined` for plain data. */
function tagHead(list: DescriptionList): TagHead | undefined {
	const head = list[0];
	if (isTag(head)) return { tag: head, attributes: [] };
	if (head !== undefined && isList(head)) {
		const first = head[0];
		if (isTag(first)) return { tag: first, attributes: head.slice(1) };
	}
	return undefined;
}

function buildAttributes(pairs: DescriptionList, path: readonly number[]): Attribute[] {
	if (pairs.length % 2 !== 0) {
		throw new BuildError(`Attribute list has odd length ${pairs.length}`, path);
	}
	const attributes: Attribute[] = [];
	for (let i = 0; i < pairs.length; i += 2) {
		const name = pairs[i];
		const value = pairs[i + 1];
		// +1 skips the tag at the head of the attribute list
		if (typeof name !== 'string') {
			throw new BuildError(`Attribute name must be a string, got ${typeof name}`, [...path, i + 1]);
		}
		if (!isAttributeValue(value)) {
			throw new BuildError(`Attribute "${name}" has a value that is not text`, [...path, i + 2]);
		}
		attributes.push({ name, value });
	}
	return attributes;
}

function buildItem(item: Description, path: readonly number[]): Node {
	if (isTag(item)) return element(item.name);
	if (!isList(item)) return item;

	const head = tagHead(item);
	if (head === undefined) {
		return item.map((member, i) => buildItem(member, [...path, i]));
	}
	const attributes = buildAttributes(head.attributes, [...path, 0]);
	const children = item.slice(1).map((member, i) => buildItem(member, [...path, i + 1]));
	return element(head.tag.name, attributes, children);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Build the tree for a list of top-level descriptions. The result holds
 * exactly one node per item, so a single element is built with
 * `build([[tag('p'), 'hi']])`.
 *
 * @throws {BuildError} For an odd-length attribute list, a non-string
 *   attribute name, or an attribute value that is a node, tag or list.
 */
export function build(items: DescriptionList): Node[] {
	return items.map((item, i) => buildItem(item, [i]));
}

/** Variadic form of {@link build}: `html([tag('p'), 'a'], [tag('p'), 'b'])`. */
export function html(...items: Description[]): Node[] {
	return build(items);
}
