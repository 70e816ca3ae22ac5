const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;'
};

/**
 * Escape HTML-significant characters.
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch]);
}

/**
 * Clean free text received from callers before it is stored:
 * HTML is escaped, then `javascript:` markers and inline event handler
 * assignments (`onclick=`) are removed and surrounding whitespace trimmed.
 */
export function sanitizeText(value: string): string {
  return escapeHtml(value)
    .replace(/javascript:/gi, '')
    .replace(/on\w+\s*=/gi, '')
    .trim();
}
