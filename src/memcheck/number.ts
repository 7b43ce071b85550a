export class MalformedNumberError extends Error {
  readonly token: string;

  constructor(token: string) {
    super(`[Parse] Malformed number: ${JSON.stringify(token)}`);
    this.name = "MalformedNumberError";
    this.token = token;
  }
}

export type NormalizedCount = {
  value: number;
  /** Text inside the first parenthetical, kept verbatim for display. */
  annotation?: string;
};

/**
 * Reads the leading count of a token such as `"1,204"` or
 * `"72 (16 direct, 56 indirect)"`. The parenthetical breakdown is returned as
 * an annotation and never contributes to the value.
 */
export function normalizeCountToken(token: string): NormalizedCount {
  const trimmed = token.trim();
  const paren = trimmed.indexOf("(");
  const head = (paren === -1 ? trimmed : trimmed.slice(0, paren)).trim();

  const m = head.match(/^\d[\d,]*/);
  if (!m) throw new MalformedNumberError(token);
  const value = Number(m[0].replace(/,/g, ""));
  if (!Number.isSafeInteger(value)) throw new MalformedNumberError(token);

  if (paren === -1) return { value };
  const close = trimmed.indexOf(")", paren);
  const annotation = trimmed.slice(paren + 1, close === -1 ? undefined : close).trim();
  return annotation.length > 0 ? { value, annotation } : { value };
}

export function normalizeCount(token: string): number {
  return normalizeCountToken(token).value;
}

export function tryNormalizeCount(token: string): number | undefined {
  try {
    return normalizeCount(token);
  } catch (err) {
    if (err instanceof MalformedNumberError) return undefined;
    throw err;
  }
}
