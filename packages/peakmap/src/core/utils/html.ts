/**
 * HTML escaping for dataset text interpolated into popup and label markup
 *
 * @module core/utils/html
 */

const HTML_ESCAPES: Readonly<Record<string, string>> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escape `& < > " '` so text is safe in element content and quoted attributes
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Serialize a value as JSON that can sit inside a `<script>` element
 *
 * `<`, `>` and `&` become unicode escapes so data cannot close the element
 * or open a comment; U+2028/U+2029 are escaped for older parsers.
 */
export function toScriptSafeJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}
