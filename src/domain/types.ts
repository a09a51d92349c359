/**
 * Domain types for latex-labels.
 */

// ── Enums (as const objects for runtime + type safety) ──────────────

export const SectionKind = {
  SECTION: "section",
  SUBSECTION: "subsection",
  SUBSUBSECTION: "subsubsection",
} as const;
export type SectionKind = (typeof SectionKind)[keyof typeof SectionKind];

export const FindingType = {
  UNPARSABLE: "unparsable",
  MISSING_LABEL: "missing-label",
  WRONG_LABEL: "wrong-label",
} as const;
export type FindingType = (typeof FindingType)[keyof typeof FindingType];

// ── Kind → label prefix mapping ─────────────────────────────────────

export const KIND_PREFIX: Record<SectionKind, string> = {
  section: "sec",
  subsection: "ssec",
  subsubsection: "sssec",
};

export const UNKNOWN_PREFIX = "unknwn";

export const DEFAULT_SKIP_MARKER = "skip-label";

// ── Scanner output ──────────────────────────────────────────────────

export interface ParsedSection {
  type: "section";
  /** Start of the line holding the sectioning command. */
  offset: number;
  kind: SectionKind;
  /** Raw title, nested commands included. */
  title: string;
  /** Trailing comment on the title line, `%` included. */
  comment: string | null;
  label: string | null;
}

export interface UnparsableSection {
  type: "unparsable";
  offset: number;
  /** Everything after the command up to end of line. */
  raw: string;
}

export type SectionMatch = ParsedSection | UnparsableSection;

// ── Check results ───────────────────────────────────────────────────

export interface Finding {
  line: number;
  type: FindingType;
  /** Slug the label should have; null for unparsable sections. */
  expected: string | null;
  /** Label found in the document, if any. */
  observed: string | null;
}

export interface DocumentReport {
  hasMismatch: boolean;
  findings: Finding[];
}

export type FileCheckResult =
  | { success: true; path: string; hasMismatch: boolean; findings: Finding[] }
  | { success: false; path: string; error: Error };

// ── Label definitions ───────────────────────────────────────────────

export interface LabelOccurrence {
  label: string;
  path: string;
  /** 1-based. */
  line: number;
  /** 0-based start of the `\label{...}` match within the line. */
  column: number;
  length: number;
  lineText: string;
}

export interface DuplicateLabel {
  label: string;
  occurrences: LabelOccurrence[];
}

export interface SourceDocument {
  path: string;
  text: string;
}
