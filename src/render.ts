/**
 * markup-tree — Escaping writer
 *
 * Walks a tree and appends its text to a sink in a single synchronous pass.
 *
 * Dispatch
 * ────────
 * • string            → escaped text.
 * • Sequence          → each member in order, no separators.
 * • Element           → open tag, children, close tag (unless void).
 * • UnsafeText        → verbatim.
 * • Sentinel          → its literal, then the line break.
 * • null / undefined  → nothing.
 * • Renderable        → `toRenderable()`, then escaped.
 * • anything else     → `String(value)`, then escaped.
 *
 * The writer never mutates the tree, so one tree may be rendered any number
 * of times, into any number of sinks.
 */

import { escape } from './escape.ts';
import { VOID_ELEMENTS, isVoidElement } from './sentinels.ts';
import { isElement, isRenderable, isSentinel, isSequence, isUnsafeText } from './types.ts';
import type { AttributeValue, Element, Node, Sink } from './types.ts';

// ---------------------------------------------------------------------------
// Public error type
// ---------------------------------------------------------------------------

/**
 * Thrown when an opaque value offers no text to render, i.e. a
 * `Renderable` whose `toRenderable()` returns something other than a string.
 */
export class RenderError extends Error {
	/** The value that could not be converted. */
	readonly value: unknown;

	constructor(message: string, value: unknown) {
		super(message);
		this.name = 'NoApplicableRendererError';
		this.value = value;
	}
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
	/** Written after every open tag, close tag and sentinel. Defaults to `"\n"`. */
	readonly lineBreak?: string;
	/** Tag names rendered without a close tag. Defaults to `VOID_ELEMENTS`. */
	readonly voidElements?: Iterable<string>;
}

interface ResolvedOptions {
	readonly lineBreak: string;
	readonly voidElements: ReadonlySet<string>;
}

function resolveOptions(options: RenderOptions | undefined): ResolvedOptions {
	const voids = options?.voidElements;
	return {
		lineBreak: options?.lineBreak ?? '\n',
		voidElements: voids === undefined ? VOID_ELEMENTS : new Set(Array.from(voids, (name) => name.toLowerCase())),
	};
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

/** In-memory sink; `toString()` returns everything written so far. */
export class StringSink implements Sink {
	private readonly chunks: string[] = [];

	write(chunk: string): void {
		this.chunks.push(chunk);
	}

	toString(): string {
		return this.chunks.join('');
	}
}

// ---------------------------------------------------------------------------
// Conversion of opaque values
// ---------------------------------------------------------------------------

/**
 * The natural text form of an opaque leaf: `toRenderable()` for a
 * `Renderable`, `String(value)` for everything else. Not escaped.
 */
export function toText(value: unknown): string {
	if (isRenderable(value)) {
		const text: unknown = value.toRenderable();
		if (typeof text !== 'string') {
			throw new RenderError(`toRenderable() returned ${typeof text}, expected string`, value);
		}
		return text;
	}
	return String(value);
}

// ---------------------------------------------------------------------------
// Internal recursive worker
// ---------------------------------------------------------------------------

function attributeText(name: string, value: AttributeValue): string | null {
	if (value === false || value == null) return null;
	return ` ${name}="${escape(value === true ? name : toText(value))}"`;
}

function writeElement(el: Element, sink: Sink, options: ResolvedOptions): void {
	const name = el.name.toLowerCase();
	let open = `<${name}`;
	for (const { name: attrName, value } of el.attributes) {
		open += attributeText(attrName.toLowerCase(), value) ?? '';
	}
	sink.write(`${open}>${options.lineBreak}`);
	writeNode(el.children, sink, options);
	if (!isVoidElement(name, options.voidElements)) {
		sink.write(`</${name}>${options.lineBreak}`);
	}
}

function writeNode(node: unknown, sink: Sink, options: ResolvedOptions): void {
	if (node == null) return;
	if (typeof node === 'string') {
		if (node.length > 0) sink.write(escape(node));
		return;
	}
	if (isSequence(node)) {
		for (const item of node) writeNode(item, sink, options);
		return;
	}
	if (isElement(node)) {
		writeElement(node, sink, options);
		return;
	}
	if (isUnsafeText(node)) {
		sink.write(node.value);
		return;
	}
	if (isSentinel(node)) {
		sink.write(`${node.literal}${options.lineBreak}`);
		return;
	}
	writeNode(toText(node), sink, options);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Append the serialized form of `node` to `sink`. */
export function write(node: Node, sink: Sink, options?: RenderOptions): void {
	writeNode(node, sink, resolveOptions(options));
}

/**
 * Render a node, or a sequence of nodes as returned by `build()`, to a
 * string.
 *
 * ```ts
 * renderToText(build([[[tag('span'), 'style', 'color:blue'], 'text']]));
 * // '<span style="color:blue">\ntext</span>\n'
 * ```
 */
export function renderToText(nodes: Node, options?: RenderOptions): string {
	const sink = new StringSink();
	write(nodes, sink, options);
	return sink.toString();
}

/**
 * Render straight into a caller-supplied sink, e.g. a Node.js `Writable`,
 * without buffering the whole result first. Back-pressure is the caller's
 * concern: the writer ignores the sink's return value.
 */
export function renderToStream(nodes: Node, sink: Sink, options?: RenderOptions): void {
	write(nodes, sink, options);
}
