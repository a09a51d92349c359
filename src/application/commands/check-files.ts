/**
 * CheckFiles command — runs CheckDocument over a batch of files.
 *
 * Files are processed one after another; a file that cannot be read is
 * reported as a failed result and the batch carries on.
 */

import type { FileCheckResult } from "../../domain/types.ts";
import { readDocument, readUtf8, type ReadTextFn } from "../../infra/document-reader.ts";
import { checkDocument, type CheckOptions } from "./check-document.ts";

export interface CheckFilesOptions extends CheckOptions {
  readText?: ReadTextFn;
}

export async function checkFile(path: string, options: CheckFilesOptions = {}): Promise<FileCheckResult> {
  const { readText = readUtf8, ...checkOptions } = options;

  let text: string;
  try {
    ({ text } = await readDocument(path, readText));
  } catch (e) {
    return { success: false, path, error: e instanceof Error ? e : new Error(String(e)) };
  }

  const report = checkDocument(text, checkOptions);
  return { success: true, path, ...report };
}

export async function checkFiles(paths: string[], options: CheckFilesOptions = {}): Promise<FileCheckResult[]> {
  const results: FileCheckResult[] = [];
  for (const path of paths) {
    results.push(await checkFile(path, options));
  }
  return results;
}

export function hasFailures(results: FileCheckResult[]): boolean {
  return results.some((r) => !r.success || r.hasMismatch);
}
