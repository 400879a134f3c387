/**
 * markup-tree — Type definitions
 *
 * A tree is ordinary data: strings, numbers and other atoms sit directly in
 * it next to the tagged node objects below. Tagged nodes carry a `type`
 * discriminant; sequences are plain readonly arrays.
 *
 *   Node
 *   ├── string              escaped text
 *   ├── number / bigint / boolean / Renderable   opaque, printed then escaped
 *   ├── null / undefined    renders nothing
 *   ├── Element
 *   ├── UnsafeText
 *   ├── Sentinel
 *   └── Sequence            ReadonlyArray<Node>
 */

// ---------------------------------------------------------------------------
// Discriminant
// ---------------------------------------------------------------------------

/** All legal values of `node.type` for tagged nodes. */
export type NodeType = 'element' | 'unsafe' | 'sentinel';

// ---------------------------------------------------------------------------
// Leaves
// ---------------------------------------------------------------------------

/** Primitive leaves. Strings are escaped text; the rest print as their literal form. */
export type Atom = string | number | bigint | boolean | null | undefined;

/**
 * Capability for caller-defined value types. The writer calls
 * `toRenderable()` and escapes the returned text like any other string.
 */
export interface Renderable {
	toRenderable(): string;
}

/** Text written verbatim, bypassing escaping. The caller vouches for its safety. */
export interface UnsafeText {
	readonly type: 'unsafe';
	readonly value: string;
}

/**
 * A fixed-form atom that writes `literal` instead of following the element
 * protocol, e.g. the document-type preamble. Created through
 * `defineSentinel()`.
 */
export interface Sentinel {
	readonly type: 'sentinel';
	readonly name: string;
	readonly literal: string;
}

// ---------------------------------------------------------------------------
// Element
// ---------------------------------------------------------------------------

/**
 * Value of an attribute. `true` renders the attribute as `name="name"`;
 * `false`, `null` and `undefined` suppress it; anything else is printed,
 * escaped and quoted.
 */
export type AttributeValue = string | number | bigint | boolean | null | undefined | Renderable;

/** A single attribute. Names are lower-cased when rendered. */
export interface Attribute {
	readonly name: string;
	readonly value: AttributeValue;
}

/** A named markup node: `<name attrs>children</name>`. */
export interface Element {
	readonly type: 'element';
	/** Tag name; case-insensitive, always lower-cased on output. */
	readonly name: string;
	/** Attributes in the order given. Duplicate names are kept as-is. */
	readonly attributes: ReadonlyArray<Attribute>;
	readonly children: Sequence;
}

// ---------------------------------------------------------------------------
// Union aliases used in the tree
// ---------------------------------------------------------------------------

/** Any member of a markup tree. */
export type Node = Atom | Element | UnsafeText | Sentinel | Renderable | Sequence;

/** Sibling nodes with no wrapping element (a fragment). */
export type Sequence = ReadonlyArray<Node>;

/** A tag identifier, as produced by `tag()`. Only meaningful inside a description. */
export interface Tag {
	readonly type: 'tag';
	readonly name: string;
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

/**
 * Output destination for the writer. A Node.js `Writable` opened in text
 * mode satisfies this shape, as does `StringSink`.
 */
export interface Sink {
	write(chunk: string): unknown;
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

/** Builds an element by hand, with the same shape `build()` produces. */
export function element(name: string, attributes: ReadonlyArray<Attribute> = [], children: Sequence = []): Element {
	return { type: 'element', name, attributes, children };
}

/** Wraps pre-escaped markup so the writer emits it verbatim. */
export function unsafe(value: string): UnsafeText {
	return { type: 'unsafe', value };
}

// ---------------------------------------------------------------------------
// Type guards
// ---------------------------------------------------------------------------

/** The `type` discriminant of a tagged object, or `undefined` for anything else. */
function kindOf(value: unknown): string | undefined {
	if (value === null || typeof value !== 'object' || Array.isArray(value)) return undefined;
	return 'type' in value && typeof value.type === 'string' ? value.type : undefined;
}

export function isElement(value: unknown): value is Element {
	return kindOf(value) === 'element';
}

export function isUnsafeText(value: unknown): value is UnsafeText {
	return kindOf(value) === 'unsafe';
}

export function isSentinel(value: unknown): value is Sentinel {
	return kindOf(value) === 'sentinel';
}

export function isTag(value: unknown): value is Tag {
	return kindOf(value) === 'tag';
}

export function isSequence(value: unknown): value is Sequence {
	return Array.isArray(value);
}

export function isRenderable(value: unknown): value is Renderable {
	return value !== null && typeof value === 'object' && 'toRenderable' in value && typeof value.toRenderable === 'function';
}
