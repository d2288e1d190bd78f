/**
 * Raw record files: an array of records, or `{ resources: [...] }`.
 */

import { UnsupportedDocumentError } from "../errors.js";
import { isPlainObject } from "../normalizer.js";
import type { RawResourceRecord } from "../types.js";

export function isRecordDocument(doc: unknown): boolean {
  return recordList(doc) !== undefined;
}

export function recordFileRecords(doc: unknown): RawResourceRecord[] {
  const list = recordList(doc);
  if (!list) {
    throw new UnsupportedDocumentError("Expected an array of resource records or an object with a resources array");
  }
  return list.map((item, index) => {
    if (!isPlainObject(item)) {
      throw new UnsupportedDocumentError(`Resource record ${index} is not an object`);
    }
    return {
      address: item.address,
      kind: item.kind,
      name: item.name,
      source: item.source,
      attributes: item.attributes,
    };
  });
}

function recordList(doc: unknown): unknown[] | undefined {
  if (Array.isArray(doc)) return doc;
  if (isPlainObject(doc) && Array.isArray(doc.resources)) return doc.resources;
  return undefined;
}
