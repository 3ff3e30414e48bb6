/**
 * SCIP index loader
 *
 * Decodes an index file with protobufjs against the schema shipped beside
 * this module, then validates each document and occurrence. Records that do
 * not validate are skipped and counted.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import protobuf, { type Type } from 'protobufjs';
import { z } from 'zod';
import {
  type ScipDocument,
  type ScipIndex,
  type ScipOccurrence,
  ScipIndexError,
  ScipIndexErrorCode,
} from './types.js';

const SCHEMA_PATH = fileURLToPath(new URL('./scip.proto', import.meta.url));

const IndexShapeSchema = z.object({
  documents: z.array(z.unknown()),
});

const DocumentShapeSchema = z.object({
  relativePath: z.string().min(1),
  occurrences: z.array(z.unknown()),
});

const OccurrenceSchema = z.object({
  symbol: z.string(),
  symbolRoles: z.number().int(),
  range: z.array(z.number().int()),
});

let indexType: Type | null = null;

/**
 * The `scip.Index` message type, loaded once
 */
export function getScipIndexType(): Type {
  if (indexType === null) {
    try {
      indexType = protobuf.loadSync(SCHEMA_PATH).lookupType('scip.Index');
    } catch (error) {
      throw new ScipIndexError(
        `Failed to load SCIP schema from ${SCHEMA_PATH}`,
        ScipIndexErrorCode.SCHEMA_FAILED,
        error instanceof Error ? error : undefined
      );
    }
  }
  return indexType;
}

/**
 * Validate a decoded index object
 */
export function normalizeScipIndex(raw: unknown): ScipIndex {
  const shape = IndexShapeSchema.safeParse(raw);
  if (!shape.success) {
    throw new ScipIndexError(
      `Decoded index has no document list: ${shape.error.message}`,
      ScipIndexErrorCode.DECODE_FAILED
    );
  }

  const documents: ScipDocument[] = [];
  let malformedRecords = 0;

  for (const rawDocument of shape.data.documents) {
    const document = DocumentShapeSchema.safeParse(rawDocument);
    if (!document.success) {
      malformedRecords++;
      continue;
    }

    const occurrences: ScipOccurrence[] = [];
    for (const rawOccurrence of document.data.occurrences) {
      const occurrence = OccurrenceSchema.safeParse(rawOccurrence);
      if (occurrence.success) {
        occurrences.push(occurrence.data);
      } else {
        malformedRecords++;
      }
    }

    documents.push({ relativePath: document.data.relativePath, occurrences });
  }

  return { documents, malformedRecords };
}

/**
 * Decode SCIP index bytes
 */
export function decodeScipIndex(bytes: Uint8Array): ScipIndex {
  const type = getScipIndexType();

  let raw: unknown;
  try {
    raw = type.toObject(type.decode(bytes), {
      longs: Number,
      enums: Number,
      defaults: true,
      arrays: true,
    });
  } catch (error) {
    throw new ScipIndexError(
      `Failed to decode SCIP index: ${error instanceof Error ? error.message : String(error)}`,
      ScipIndexErrorCode.DECODE_FAILED,
      error instanceof Error ? error : undefined
    );
  }

  return normalizeScipIndex(raw);
}

/**
 * Read and decode a SCIP index file
 *
 * @throws ScipIndexError NOT_FOUND when there is no file at `path`
 */
export async function loadScipIndex(path: string): Promise<ScipIndex> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ScipIndexError(`SCIP index not found: ${path}`, ScipIndexErrorCode.NOT_FOUND, error);
    }
    throw new ScipIndexError(
      `Failed to read SCIP index ${path}: ${error instanceof Error ? error.message : String(error)}`,
      ScipIndexErrorCode.DECODE_FAILED,
      error instanceof Error ? error : undefined
    );
  }

  return decodeScipIndex(bytes);
}
