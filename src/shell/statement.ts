/** SQL line comment marker. */
export const COMMENT_PREFIX = "--";

export type QuoteChar = "'" | '"';

export interface Completeness {
  complete: boolean;
  /** Quote character of an unterminated quoted region, if any. */
  openQuote: QuoteChar | null;
}

/**
 * Decide whether `text` is a complete SQL statement: it ends with `;`
 * and leaves no quote open.
 *
 * Quotes are tracked by a plain toggle. Backslash escapes are not
 * understood, so `'it\'s'` reads as an open quote.
 */
export function isComplete(text: string): Completeness {
  let openQuote: QuoteChar | null = null;
  for (const ch of text) {
    if (openQuote !== null) {
      if (ch === openQuote) openQuote = null;
    } else if (ch === "'" || ch === '"') {
      openQuote = ch;
    }
  }
  return { complete: openQuote === null && text.endsWith(";"), openQuote };
}

/**
 * Whether a line belongs in a statement being assembled. Outside a
 * quote, blank lines and `--` comment lines are dropped.
 */
export function keepLine(line: string, inQuote: QuoteChar | null): boolean {
  if (inQuote !== null) return true;
  const stripped = line.trimStart();
  return stripped !== "" && !stripped.startsWith(COMMENT_PREFIX);
}

/**
 * A statement assembled from one or more lines.
 *
 * Lines outside a quote are trimmed; lines inside one are kept as typed.
 * Pieces are joined with a single space.
 */
export class PendingStatement {
  private _text = "";
  private _openQuote: QuoteChar | null = null;
  private _complete = false;

  get text(): string {
    return this._text;
  }

  get openQuote(): QuoteChar | null {
    return this._openQuote;
  }

  get complete(): boolean {
    return this._complete;
  }

  get isEmpty(): boolean {
    return this._text === "";
  }

  /** Add a line. Returns `false` if the line was dropped. */
  add(line: string): boolean {
    if (!keepLine(line, this._openQuote)) return false;

    const piece = this._openQuote === null ? line.trim() : line;
    this._text = this._text === "" ? piece : `${this._text} ${piece}`;

    const state = isComplete(this._text);
    this._complete = state.complete;
    this._openQuote = state.openQuote;
    return true;
  }

  reset(): void {
    this._text = "";
    this._openQuote = null;
    this._complete = false;
  }
}
