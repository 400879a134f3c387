/**
 * markup-tree — Escaping primitives
 *
 * One rule covers text content and attribute values alike: the four
 * characters `<`, `>`, `&` and `"` become entity references and every other
 * character passes through unchanged.
 */

const SPECIAL = /[<>&"]/g;

/** Escape a single character. Anything but `< > & "` is returned as given. */
export function escapeChar(ch: string): string {
	switch (ch) {
		case '<':
			return '&lt;';
		case '>':
			return '&gt;';
		case '&':
			return '&amp;';
		case '"':
			return '&quot;';
		default:
			return ch;
	}
}

/**
 * Escape every character of `text` in order, for use in element content or
 * inside a double-quoted attribute value.
 *
 * ```ts
 * escape('a < b & "c"'); // 'a &lt; b &amp; &quot;c&quot;'
 * ```
 */
export function escape(text: string): string {
	return text.replace(SPECIAL, escapeChar);
}
