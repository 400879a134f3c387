/**
 * Tests for tag(), build() and html().
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BuildError, DOCTYPE, build, element, html, renderToText, tag, unsafe } from '../src/index.ts';
import type { Renderable } from '../src/index.ts';
import { compact, requireElement } from './helpers.ts';

// ---------------------------------------------------------------------------
// Tag identifiers
// ---------------------------------------------------------------------------

describe('tag', () => {
	it('interns identifiers case-insensitively', () => {
		assert.equal(tag('DIV'), tag('div'));
		assert.equal(tag('Div').name, 'div');
	});

	it('returns frozen identifiers', () => {
		assert.ok(Object.isFrozen(tag('p')));
	});
});

// ---------------------------------------------------------------------------
// Element construction
// ---------------------------------------------------------------------------

describe('build — elements', () => {
	it('returns one node per top-level item', () => {
		assert.deepEqual(build([]), []);
		assert.deepEqual(build(['x']), ['x']);
		assert.equal(build([[tag('p')], 'x', [tag('p')]]).length, 3);
	});

	it('builds a tag form with children', () => {
		assert.deepEqual(build([[tag('p'), 'hi']]), [{ type: 'element', name: 'p', attributes: [], children: ['hi'] }]);
	});

	it('builds a bare tag as an empty element', () => {
		assert.deepEqual(build([tag('br')]), [element('br')]);
	});

	it('builds attribute pairs from the head list', () => {
		const [a] = build([[[tag('a'), 'href', '/x?a=1&b=2', 'target', '_blank'], 'go']]);
		assert.deepEqual(requireElement(a).attributes, [
			{ name: 'href', value: '/x?a=1&b=2' },
			{ name: 'target', value: '_blank' },
		]);
		assert.equal(compact(a), '<a href="/x?a=1&amp;b=2" target="_blank">go</a>');
	});

	it('accepts a head list with no attributes', () => {
		assert.deepEqual(build([[[tag('p')], 'x']]), [element('p', [], ['x'])]);
	});

	it('renders an empty element as an open/close pair', () => {
		assert.equal(renderToText(build([[tag('tag')]])), '<tag>\n</tag>\n');
		assert.equal(renderToText(build([[tag('input')]])), '<input>\n');
		assert.equal(renderToText(build([tag('br')])), '<br>\n</br>\n');
		assert.equal(renderToText(build([[tag('img'), 'x']])), '<img>\nx</img>\n');
	});

	it('renders the span example', () => {
		assert.equal(renderToText(build([[[tag('span'), 'style', 'color:blue'], 'text']])), '<span style="color:blue">\ntext</span>\n');
	});

	it('renders boolean attributes as flags', () => {
		const nodes = build([[[tag('input'), 'type', 'checkbox', 'checked', true, 'disabled', false]]]);
		assert.equal(renderToText(nodes), '<input type="checkbox" checked="checked">\n');
	});

	it('keeps duplicate attributes verbatim', () => {
		const nodes = build([[[tag('p'), 'class', 'a', 'CLASS', 'b']]]);
		assert.equal(compact(nodes), '<p class="a" class="b"></p>');
	});

	it('accepts renderable attribute values', () => {
		const id: Renderable = { toRenderable: () => 'row-7' };
		assert.equal(compact(build([[[tag('tr'), 'id', id]]])), '<tr id="row-7"></tr>');
	});

	it('reads a leading tag form as the attribute head', () => {
		const [li] = build([[[tag('li'), 'class', 'a'], [tag('li'), 'b']]]);
		assert.equal(compact(li), '<li class="a"><li>b</li></li>');
	});
});

// ---------------------------------------------------------------------------
// Atoms, fragments and pass-through
// ---------------------------------------------------------------------------

describe('build — pass-through', () => {
	it('does not pre-escape atoms', () => {
		assert.deepEqual(build(['<b>', 7, true, null]), ['<b>', 7, true, null]);
	});

	it('renders a fragment as the concatenation of its items', () => {
		const a = [tag('h1'), 'T'];
		const b = 'plain & simple';
		const c = [[tag('p'), 'class', 'x'], 'body'];
		const all = build([a, b, c]);
		assert.equal(all.length, 3);
		assert.equal(renderToText(all), renderToText(build([a])) + renderToText(build([b])) + renderToText(build([c])));
	});

	it('embeds a prebuilt element unchanged', () => {
		const [card] = build([[[tag('div'), 'class', 'card'], 'Hello']]);
		const [section] = build([[tag('section'), card]]);
		assert.equal(requireElement(section).children[0], card);
		assert.equal(renderToText(section), `<section>\n${renderToText(card)}</section>\n`);
	});

	it('builds tag forms inside plain lists', () => {
		assert.deepEqual(build([['a', [tag('b'), 'c']]]), [['a', element('b', [], ['c'])]]);
	});

	it('splices prebuilt sequences', () => {
		const items = build(['x', 'y'].map((label) => [tag('li'), label]));
		assert.equal(compact(build([[tag('ul'), items]])), '<ul><li>x</li><li>y</li></ul>');
	});

	it('passes unsafe text and sentinels through', () => {
		assert.equal(compact(build([[tag('div'), unsafe('<hr>')]])), '<div><hr></div>');
		assert.equal(renderToText(build([DOCTYPE, [tag('html')]])), '<!doctype html>\n<html>\n</html>\n');
	});

	it('html() is the variadic form of build()', () => {
		assert.deepEqual(html([tag('p'), 'a'], 'b'), build([[tag('p'), 'a'], 'b']));
	});
});

// ---------------------------------------------------------------------------
// Malformed descriptions
// ---------------------------------------------------------------------------

describe('build — malformed descriptions', () => {
	it('rejects an odd-length attribute list', () => {
		assert.throws(() => build([[[tag('a'), 'href']]]), {
			name: 'MalformedDescriptionError',
			message: 'Attribute list has odd length 1 (at item 0.0)',
			path: [0, 0],
		});
	});

	it('rejects a non-string attribute name', () => {
		assert.throws(() => build([[tag('div'), [[tag('a'), 42, 'x']]]]), {
			name: 'MalformedDescriptionError',
			message: 'Attribute name must be a string, got number (at item 0.1.0.1)',
			path: [0, 1, 0, 1],
		});
	});

	it('rejects a node as an attribute value', () => {
		assert.throws(() => build([[[tag('a'), 'title', [tag('b')]]]]), (err: unknown) => err instanceof BuildError && err.path.join('.') === '0.0.2');
		assert.throws(() => build([[[tag('a'), 'title', unsafe('x')]]]), BuildError);
		assert.throws(() => build([[[tag('a'), 'title', tag('b')]]]), BuildError);
	});

	it('aborts the whole build', () => {
		assert.throws(() => build(['ok', [tag('p'), [[tag('a'), 'x']]]]), BuildError);
	});
});
