import { describe, expect, it } from "vitest";

import { SectionScanner } from "../../infra/section-scanner.ts";
import { checkDocument, formatFinding } from "./check-document.ts";

describe("checkDocument", () => {
  it("reports a missing label", () => {
    expect(checkDocument("\\section{Hello World}")).toEqual({
      hasMismatch: true,
      findings: [{ line: 1, type: "missing-label", expected: "sec:hello-world", observed: null }],
    });
  });

  it("accepts a matching label", () => {
    expect(checkDocument("\\section{Hello World}\n\\label{sec:hello-world}")).toEqual({
      hasMismatch: false,
      findings: [],
    });
  });

  it("reports a wrong label", () => {
    expect(checkDocument("\\section{Hello World}\n\\label{sec:hello}")).toEqual({
      hasMismatch: true,
      findings: [{ line: 1, type: "wrong-label", expected: "sec:hello-world", observed: "sec:hello" }],
    });
  });

  it("skips a wrong label when the comment opts out", () => {
    expect(checkDocument("\\section{Hello World} % skip-label\n\\label{sec:hello}")).toEqual({
      hasMismatch: false,
      findings: [],
    });
  });

  it("still reports a missing label behind an opt-out comment", () => {
    expect(checkDocument("\\section{Hello World} % skip-label").findings).toEqual([
      { line: 1, type: "missing-label", expected: "sec:hello-world", observed: null },
    ]);
  });

  it("uses a configured opt-out marker", () => {
    const text = "\\section{Hello World} % nolabel\n\\label{sec:hello}";
    expect(checkDocument(text, { skipMarker: "nolabel" }).findings).toEqual([]);
    expect(checkDocument(text).findings).toHaveLength(1);
  });

  it("falls back to the default marker when given an empty one", () => {
    const text = "\\section{Hello World} % note\n\\label{sec:hello}";
    expect(checkDocument(text, { skipMarker: "" }).findings).toEqual([
      { line: 1, type: "wrong-label", expected: "sec:hello-world", observed: "sec:hello" },
    ]);
    expect(checkDocument("\\section{Hello World} % skip-label\n\\label{sec:hello}", { skipMarker: " " }).findings).toEqual(
      [],
    );
  });

  it("distinguishes titles in non-latin scripts", () => {
    const text = "\\section{Введение}\n\\label{sec:}\n\\section{Борис}\n\\label{sec:boris}\n";
    expect(checkDocument(text)).toEqual({
      hasMismatch: true,
      findings: [{ line: 1, type: "wrong-label", expected: "sec:vvedenie", observed: "sec:" }],
    });
  });

  it("warns about unparsable sections without failing", () => {
    expect(checkDocument("Intro\n\n\\subsection{A{B{C{D{EE}D}C}B}A}\n")).toEqual({
      hasMismatch: false,
      findings: [{ line: 3, type: "unparsable", expected: null, observed: null }],
    });
  });

  it("accepts double nested titles with the right label", () => {
    const text = "\\subsubsection{Formalization of \\texorpdfstring{\\acs{knn}}{k-NN}}\n\\label{sssec:formalization-of-knn}";
    expect(checkDocument(text)).toEqual({ hasMismatch: false, findings: [] });
  });

  it("reports line numbers across a document", () => {
    const text = [
      "\\documentclass{article}",
      "",
      "\\section{Intro}",
      "\\label{sec:intro}",
      "\\subsection{Details}",
      "",
    ].join("\n");

    expect(checkDocument(text).findings).toEqual([
      { line: 5, type: "missing-label", expected: "ssec:details", observed: null },
    ]);
  });

  it("has no findings for an empty document", () => {
    expect(checkDocument("")).toEqual({ hasMismatch: false, findings: [] });
  });

  it("runs the given scanner", () => {
    const scanner = new SectionScanner({ commands: ["section"] });
    expect(checkDocument("\\subsection{Unchecked}", { scanner })).toEqual({ hasMismatch: false, findings: [] });
  });
});

describe("formatFinding", () => {
  it("formats each finding type", () => {
    expect(formatFinding("main.tex", { line: 3, type: "unparsable", expected: null, observed: null })).toBe(
      "main.tex:3 Unprocessable Section",
    );
    expect(
      formatFinding("main.tex", { line: 1, type: "missing-label", expected: "sec:hello-world", observed: null }),
    ).toBe("main.tex:1 Missing Label, use \\label{sec:hello-world}");
    expect(
      formatFinding("main.tex", { line: 2, type: "wrong-label", expected: "sec:hello-world", observed: "sec:hello" }),
    ).toBe("main.tex:2 Wrong Label 'sec:hello', use \\label{sec:hello-world}");
  });
});
