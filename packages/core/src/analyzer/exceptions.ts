const PATTERNS = {
  // java.lang.NullPointerException -> NullPointerException
  TYPE_NAME: /\b(?:[A-Za-z_$][\w$]*\.)*([A-Z][\w$]*(?:Exception|Error|Fault))\b/g,
  ERRNO:
    /\bE(?:CONNREFUSED|CONNRESET|CONNABORTED|TIMEDOUT|NOENT|ACCES|ADDRINUSE|ADDRNOTAVAIL|PIPE|PERM|NOTFOUND|AI_AGAIN|MFILE|EXIST|ISDIR|NOTDIR|NOTEMPTY|HOSTUNREACH|NETUNREACH|NOMEM|NOSPC|BUSY)\b/g,
  MARKER: /\b(?:caused by|exception)\s*:\s*([^;|]+)/gi,
};

const MAX_MARKER_LENGTH = 120;

/** Exception and error type tokens mentioned in a message */
export function extractExceptionTokens(message: string): Set<string> {
  const tokens = new Set<string>();

  for (const m of message.matchAll(PATTERNS.TYPE_NAME)) {
    if (m[1]) tokens.add(m[1]);
  }
  for (const m of message.matchAll(PATTERNS.ERRNO)) {
    tokens.add(m[0]);
  }
  for (const m of message.matchAll(PATTERNS.MARKER)) {
    const tail = m[1]?.trim().slice(0, MAX_MARKER_LENGTH).trim();
    if (tail) tokens.add(tail);
  }

  return tokens;
}
