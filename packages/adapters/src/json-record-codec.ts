/**
 * JsonRecordCodec - Stores local records as JSON documents.
 *
 * Document format:
 *   { "records": [{ "name": "Morning run", "content": "..." }] }
 * A document written by encode() always holds exactly one record; documents
 * from other clients may hold any number.
 */

import {
  CodecError,
  type LocalRecord,
  type LocalStore,
  type RecordCodec,
} from "@foldersync/core";

interface DocumentEntry {
  name: string;
  content: string;
}

/**
 * Configuration options for JsonRecordCodec.
 */
export interface JsonRecordCodecOptions {
  /**
   * Clock for the modified time of decoded records; the engine overwrites it
   * with the remote file's time when it links them.
   */
  now?: () => number;
}

function isDocumentEntry(value: unknown): value is DocumentEntry {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "content" in value &&
    typeof value.content === "string"
  );
}

/**
 * Parse and validate a document.
 * @throws CodecError if the content is not a valid document
 */
export function parseDocument(content: Uint8Array): DocumentEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(content));
  } catch (error) {
    throw new CodecError({ message: "Document is not valid JSON", cause: error });
  }

  if (typeof parsed !== "object" || parsed === null) {
    throw new CodecError({ message: "Document must be a JSON object" });
  }
  const records: unknown = "records" in parsed ? parsed.records : undefined;
  if (!Array.isArray(records)) {
    throw new CodecError({ message: "Document must include a 'records' array" });
  }

  const entries: DocumentEntry[] = [];
  records.forEach((entry: unknown, index: number) => {
    if (!isDocumentEntry(entry)) {
      throw new CodecError({
        message: `records[${index}] must have string 'name' and 'content'`,
      });
    }
    entries.push({ name: entry.name, content: entry.content });
  });
  return entries;
}

/**
 * Turn a record name into a safe file name.
 */
export function toFileName(name: string): string {
  const base = name
    .trim()
    .replace(/[\\/:*?"<>|]+/g, "_")
    .replace(/\s+/g, " ");
  return `${base || "untitled"}.json`;
}

export class JsonRecordCodec implements RecordCodec {
  readonly mimeType = "application/json";
  private now: () => number;

  constructor(
    private readonly local: LocalStore,
    options: JsonRecordCodecOptions = {}
  ) {
    this.now = options.now ?? (() => Date.now());
  }

  fileName(record: LocalRecord): string {
    return toFileName(record.name);
  }

  /**
   * Create one unlinked local record per document entry.
   * If creation fails part way, the records already created are removed.
   */
  async decode(content: Uint8Array): Promise<string[]> {
    const entries = parseDocument(content);
    const created: string[] = [];
    try {
      for (const entry of entries) {
        const record = await this.local.createRecord({
          name: entry.name,
          content: entry.content,
          remoteLink: "",
          modifiedAt: this.now(),
        });
        created.push(record.id);
      }
    } catch (error) {
      for (const id of created) {
        await this.local.deleteRecord(id);
      }
      throw error;
    }
    return created;
  }

  async encode(record: LocalRecord): Promise<Uint8Array> {
    const document = { records: [{ name: record.name, content: record.content }] };
    return new TextEncoder().encode(JSON.stringify(document, null, 2));
  }
}
