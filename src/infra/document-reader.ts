/**
 * Document reader — loads LaTeX sources from disk.
 */

import { readFile } from "node:fs/promises";
import { DocumentReadError } from "../domain/errors.ts";
import type { SourceDocument } from "../domain/types.ts";

export type ReadTextFn = (path: string) => Promise<string>;

export const readUtf8: ReadTextFn = (path) => readFile(path, "utf8");

export async function readDocument(path: string, readText: ReadTextFn = readUtf8): Promise<SourceDocument> {
  try {
    return { path, text: await readText(path) };
  } catch (e) {
    throw new DocumentReadError(path, e);
  }
}
