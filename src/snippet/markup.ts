/**
 * Markup helpers for snippet output.
 *
 * All generated markup goes through `element`, which escapes attribute
 * values. Element content is passed in already rendered; callers escape
 * text with `escapeHtml`.
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => ESCAPES[ch] ?? ch);
}

/**
 * Attribute map. `undefined` values are omitted; order is preserved.
 */
export type Attributes = Record<string, string | undefined>;

function renderAttributes(attrs: Attributes): string {
  let out = '';
  for (const [name, value] of Object.entries(attrs)) {
    if (value !== undefined) {
      out += ` ${name}="${escapeHtml(value)}"`;
    }
  }
  return out;
}

/**
 * Render an element with pre-rendered inner markup.
 */
export function element(tag: string, attrs: Attributes, inner = ''): string {
  return `<${tag}${renderAttributes(attrs)}>${inner}</${tag}>`;
}

/**
 * Render a void element (no content, no closing tag).
 */
export function voidElement(tag: string, attrs: Attributes): string {
  return `<${tag}${renderAttributes(attrs)}>`;
}
