import type { SignatureSettings } from "../config.js";

export type SignatureOptions = Partial<SignatureSettings>;

export const DEFAULT_SIGNATURE_OPTIONS: SignatureSettings = {
  maxTokens: 8,
  maxLength: 96,
  stripPaths: true,
  stripNumbers: true,
};

const PLACEHOLDER = /^<[a-z]+>$/;

const PATTERNS = {
  TIMESTAMP: /\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:[.,]\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g,
  UUID: /\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi,
  URL: /\b[a-z][\w+.-]*:\/\/\S+/gi,
  // /var/log/app.log, C:\temp\x, ./a/b, src/db.ts:10:5
  PATH: /(?:[A-Za-z]:)?[\w.$@~-]*(?:[\\/][\w.$@~-]+)+[\\/]?(?::\d+)*/g,
  // Foo.java:42, app.py:7
  SOURCE_LOCATION: /[\w$.-]*\.[A-Za-z]\w{0,5}:\d+(?::\d+)?/g,
  // letters, marks and digits of any script survive
  PUNCTUATION: /[^\p{L}\p{M}\p{N}<>\s]+|<(?![a-z]+>)|(?<!<[a-z]+)>/gu,
  NUMBER: /^\d+$/,
  HEX: /^(?:0x[0-9a-f]+|(?=[0-9a-f]*\d)[0-9a-f]{8,})$/,
};

/**
 * Map a free-text message to a short grouping key.
 *
 * Pure and idempotent: normalizeSignature(normalizeSignature(m)) equals
 * normalizeSignature(m) for every message and every option set.
 */
export function normalizeSignature(message: string, options: SignatureOptions = {}): string {
  const opts = { ...DEFAULT_SIGNATURE_OPTIONS, ...options };

  let s = message.replace(PATTERNS.TIMESTAMP, " <ts> ").replace(PATTERNS.UUID, " <id> ");
  if (opts.stripPaths) {
    s = s
      .replace(PATTERNS.URL, " <url> ")
      .replace(PATTERNS.PATH, " <path> ")
      .replace(PATTERNS.SOURCE_LOCATION, " <path> ");
  }

  const mask = (t: string): string => (opts.stripNumbers ? maskNumber(t) : t);
  const tokens = s
    .toLowerCase()
    .replace(PATTERNS.PUNCTUATION, " ")
    .split(/\s+/)
    .filter(Boolean)
    .map(mask);

  return truncate(tokens, opts.maxTokens, opts.maxLength, mask) || "<empty>";
}

/* ---------------- helpers ---------------- */

function maskNumber(token: string): string {
  if (PLACEHOLDER.test(token)) return token;
  if (PATTERNS.NUMBER.test(token)) return "<num>";
  if (PATTERNS.HEX.test(token)) return "<hex>";
  return token;
}

function truncate(
  tokens: string[],
  maxTokens: number,
  maxLength: number,
  mask: (t: string) => string,
): string {
  const kept: string[] = [];
  let length = 0;
  for (const token of tokens.slice(0, maxTokens)) {
    const next = length + (kept.length ? 1 : 0) + token.length;
    if (next > maxLength) {
      if (!kept.length) {
        // a cut token must already be a fixed point: no dangling "<ab", no bare
        // digits, no half of a surrogate pair
        const cut = mask(
          token
            .slice(0, maxLength)
            .replace(/[\uD800-\uDBFF]$/, "")
            .replace(/<[a-z]*$/, ""),
        );
        if (cut) kept.push(cut);
      }
      break;
    }
    kept.push(token);
    length = next;
  }
  return kept.join(" ");
}
