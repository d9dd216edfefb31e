const ENTITIES: Readonly<Record<string, string>> = { '&': '&amp;', '<': '&lt;', '>': '&gt;', '"': '&quot;' };

/** Escapes text for an HTML/SVG element body or a double-quoted attribute. */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"]/g, (char) => ENTITIES[char] ?? char);
}

/** Escapes the characters that would break a pipe-table cell or start inline markup. */
export function escapeMarkdown(value: string): string {
  return value.replace(/[\\|`*_]/g, '\\$&');
}
