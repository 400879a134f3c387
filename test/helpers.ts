/**
 * Test helpers — compact rendering, element narrowing and an in-process
 * stream sink.
 */
import { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { renderToText } from '../src/render.ts';
import { isElement } from '../src/types.ts';
import type { Element, Node } from '../src/types.ts';

/** Renders with no line breaks, for assertions on the markup alone. */
export function compact(nodes: Node): string {
	return renderToText(nodes, { lineBreak: '' });
}

/** Returns `node` as an element, throwing if it is anything else. */
export function requireElement(node: Node): Element {
	if (!isElement(node)) throw new Error(`Expected an element, got ${JSON.stringify(node)}`);
	return node;
}

/** A string-mode `Writable` that records every chunk it receives. */
export function collectingStream(): { stream: Writable; chunks: string[]; done: () => Promise<string> } {
	const chunks: string[] = [];
	const stream = new Writable({
		decodeStrings: false,
		write(chunk: string, _encoding, callback) {
			chunks.push(chunk);
			callback();
		},
	});
	const done = async (): Promise<string> => {
		stream.end();
		await finished(stream);
		return chunks.join('');
	};
	return { stream, chunks, done };
}
