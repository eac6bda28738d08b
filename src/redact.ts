const URL_RX = /https?:\/\/([\w.-]+)(?:\/\S*)?/gi;
const EMAIL_RX = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
// Digit runs that follow an ISBN marker are book identifiers, not phone numbers.
const PHONE_RX = /(?<!ISBN(?:-1[03])?:?\s*[\dXx-]*)\b\d{3}[-.\s]?\d{3}[-.\s]?\d{4}\b/gi;

export const EMAIL_PLACEHOLDER = "[EMAIL]";
export const PHONE_PLACEHOLDER = "[PHONE]";

export function collapseWhitespace(text: string): string {
  return (text ?? "").replace(/\s+/g, " ").trim();
}

export function isAllowedDomain(domain: string, allowList: readonly string[]): boolean {
  const d = domain.toLowerCase();
  return allowList.some((allowed) => d === allowed || d.endsWith(`.${allowed}`));
}

/**
 * Replace PII-like substrings with placeholder tokens.
 *
 * URLs become `[URL:<domain>]` unless the domain is allow-listed, in which case
 * the full URL is kept. Placeholders never match the detection patterns, so
 * redacting already-redacted text is a no-op.
 */
export function redactText(text: string, allowList: readonly string[] = []): string {
  if (!text) return text ?? "";
  let out = text.replace(URL_RX, (match: string, domain: string) =>
    isAllowedDomain(domain, allowList) ? match : `[URL:${domain.toLowerCase()}]`,
  );
  out = out.replace(EMAIL_RX, EMAIL_PLACEHOLDER);
  out = out.replace(PHONE_RX, PHONE_PLACEHOLDER);
  return out;
}

export interface ExcerptOptions {
  maxChars: number;
  allowList: readonly string[];
}

/** Collapse whitespace, redact, then truncate to `maxChars`. */
export function buildExcerpt(text: string, opts: ExcerptOptions): string {
  return redactText(collapseWhitespace(text), opts.allowList).slice(0, opts.maxChars);
}
