/**
 * Label rules as pure functions.
 */

import anyAscii from "any-ascii";
import { KIND_PREFIX, SectionKind, UNKNOWN_PREFIX } from "./types.ts";

// ── Kind prefix ─────────────────────────────────────────────────────

export const KIND_LOOKUP: Record<string, SectionKind> = Object.fromEntries(
  Object.values(SectionKind).map((k) => [k, k]),
);

export function parseSectionKind(value: string): SectionKind | null {
  return KIND_LOOKUP[value.toLowerCase().trim()] ?? null;
}

export function labelPrefix(kind: string): string {
  const known = KIND_LOOKUP[kind];
  return known ? KIND_PREFIX[known] : UNKNOWN_PREFIX;
}

// ── Slug normalization ──────────────────────────────────────────────

export function slugify(text: string): string {
  let slug = anyAscii(text).toLowerCase();
  slug = slug.replace(/[^a-z0-9]+/g, "-");
  slug = slug.replace(/^-+|-+$/g, "");
  return slug;
}

// ── Opt-out ─────────────────────────────────────────────────────────

export function isOptedOut(comment: string | null, marker: string): boolean {
  return marker !== "" && comment !== null && comment.includes(marker);
}

// ── Offsets ─────────────────────────────────────────────────────────

export function offsetToLineNumber(text: string, offset: number): number {
  if (!Number.isInteger(offset) || offset < 0 || offset > text.length) {
    throw new RangeError(`Offset ${offset} is outside of text with length ${text.length}`);
  }

  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}
