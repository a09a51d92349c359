/**
 * Section scanning — locates \section-like commands, their titles, trailing
 * comments and the \label that follows them.
 *
 * Titles may contain brace groups nested two levels deep, e.g.
 * `\subsubsection{Of \texorpdfstring{\acs{knn}}{k-NN}}`. Anything deeper is
 * returned as an unparsable match instead of being guessed at.
 */

import { SectionKind, type ParsedSection, type SectionMatch } from "../domain/types.ts";

export interface SectionScannerOptions {
  /** Command names to look for, without the backslash. */
  commands?: readonly SectionKind[];
  /** Brace levels allowed inside the title group. */
  maxTitleDepth?: number;
  labelCommand?: string;
}

const NEWLINE = "\n";

function isInlineSpace(ch: string | undefined): boolean {
  return ch !== undefined && ch !== NEWLINE && /\s/u.test(ch);
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z@]/.test(ch);
}

export class SectionScanner {
  private readonly commands: readonly SectionKind[];
  private readonly maxTitleDepth: number;
  private readonly labelToken: string;

  constructor(options: SectionScannerOptions = {}) {
    // longest first so `\subsubsection` is not read as a prefix match
    this.commands = [...(options.commands ?? Object.values(SectionKind))].sort(
      (a, b) => b.length - a.length,
    );
    this.maxTitleDepth = options.maxTitleDepth ?? 2;
    this.labelToken = `\\${options.labelCommand ?? "label"}{`;
  }

  /** Lazily yields matches in document order. */
  *scan(text: string): Generator<SectionMatch> {
    let lineStart = 0;
    while (lineStart < text.length) {
      const hit = this.matchAt(text, lineStart);
      if (hit) yield hit.match;

      const next = nextLineStart(text, hit ? hit.end : lineStart + 1);
      if (next === null) return;
      lineStart = next;
    }
  }

  parse(text: string): SectionMatch[] {
    return [...this.scan(text)];
  }

  private matchAt(text: string, lineStart: number): { match: SectionMatch; end: number } | null {
    let pos = lineStart;
    while (isInlineSpace(text[pos])) pos++;
    if (text[pos] !== "\\") return null;
    pos++;

    const kind = this.commands.find((c) => text.startsWith(c, pos));
    if (!kind) return null;
    pos += kind.length;
    if (isLetter(text[pos])) return null;

    if (text[pos] === "*") pos++;
    while (text[pos] === " ") pos++;

    const titleEnd = text[pos] === "{" ? this.findTitleEnd(text, pos + 1) : null;
    if (titleEnd === null) {
      const end = lineEnd(text, pos);
      return {
        match: { type: "unparsable", offset: lineStart, raw: text.slice(pos, end) },
        end,
      };
    }

    const title = text.slice(pos + 1, titleEnd);

    pos = titleEnd + 1;
    while (isInlineSpace(text[pos])) pos++;
    let comment: string | null = null;
    if (text[pos] === "%") {
      const end = lineEnd(text, pos);
      comment = text.slice(pos, end);
      pos = end;
    }

    const section: ParsedSection = { type: "section", offset: lineStart, kind, title, comment, label: null };

    if (text[pos] === NEWLINE) {
      const label = this.matchLabel(text, pos + 1);
      if (label) return { match: { ...section, label: label.value }, end: label.end };
      // the line break is consumed either way
      return { match: section, end: pos + 1 };
    }

    const label = this.matchLabel(text, pos);
    if (label) return { match: { ...section, label: label.value }, end: label.end };
    return { match: section, end: pos };
  }

  /**
   * Index of the `}` closing a title whose content starts at `start`, or null
   * when the group is unterminated or nests deeper than allowed.
   */
  private findTitleEnd(text: string, start: number): number | null {
    let depth = 0;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (ch === "{") {
        depth++;
        if (depth > this.maxTitleDepth) return null;
      } else if (ch === "}") {
        if (depth === 0) return i;
        depth--;
      }
    }
    return null;
  }

  /** `\label{...}` running to end of line, leading inline whitespace allowed. */
  private matchLabel(text: string, start: number): { value: string; end: number } | null {
    let pos = start;
    while (isInlineSpace(text[pos])) pos++;
    if (!text.startsWith(this.labelToken, pos)) return null;

    const valueStart = pos + this.labelToken.length;
    const end = lineEnd(text, valueStart);
    // CRLF input: the brace sits before the \r
    const close = text[end - 1] === "\r" ? end - 2 : end - 1;
    if (close < valueStart || text[close] !== "}") return null;
    return { value: text.slice(valueStart, close), end };
  }
}

function lineEnd(text: string, from: number): number {
  const idx = text.indexOf(NEWLINE, from);
  return idx === -1 ? text.length : idx;
}

/** First line start at or after `pos`, or null at end of text. */
function nextLineStart(text: string, pos: number): number | null {
  if (pos > 0 && text[pos - 1] === NEWLINE && pos < text.length) return pos;
  const idx = text.indexOf(NEWLINE, pos);
  if (idx === -1 || idx + 1 >= text.length) return null;
  return idx + 1;
}

export const defaultSectionScanner = new SectionScanner();
