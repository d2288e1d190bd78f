/**
 * Document loader — reads JSON or YAML files into plain values.
 * YAML files may hold several documents; every one is returned.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { JSONPath } from "jsonpath-plus";
import { parseAllDocuments } from "yaml";
import { DocumentParseError, UnsupportedDocumentError } from "../errors.js";

export type DocumentFormat = "json" | "yaml";

export function formatFromPath(file: string): DocumentFormat {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".json") return "json";
  if (ext === ".yaml" || ext === ".yml") return "yaml";
  throw new UnsupportedDocumentError(`Unsupported file extension "${ext || "(none)"}" for ${file}`);
}

/** Read and parse every document in a file. */
export function loadDocuments(file: string): unknown[] {
  const format = formatFromPath(file);
  return parseDocuments(fs.readFileSync(file, "utf-8"), format, file);
}

export function parseDocuments(text: string, format: DocumentFormat, name = "<input>"): unknown[] {
  if (format === "json") {
    try {
      const value: unknown = JSON.parse(text);
      return [value];
    } catch (err) {
      throw new DocumentParseError(name, err);
    }
  }

  const docs: unknown[] = [];
  for (const doc of parseAllDocuments(text)) {
    const [first] = doc.errors;
    if (first) throw new DocumentParseError(name, first);
    const value: unknown = doc.toJS();
    // Empty documents, e.g. a trailing "---".
    if (value === null || value === undefined) continue;
    docs.push(value);
  }
  return docs;
}

/**
 * Pick values out of parsed documents with a JSONPath expression. Matches
 * that are arrays are spread, and all matches form a single record list.
 */
export function selectRecords(docs: readonly unknown[], expression: string): unknown[] {
  const records: unknown[] = [];
  for (const doc of docs) {
    if (typeof doc !== "object" || doc === null) continue;
    const matches: unknown = JSONPath({ path: expression, json: doc, wrap: true });
    if (!Array.isArray(matches)) continue;
    for (const match of matches) {
      if (Array.isArray(match)) records.push(...match);
      else records.push(match);
    }
  }
  return [records];
}
