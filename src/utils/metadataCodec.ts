/**
 * Metadata codec - backends only store flat scalar metadata, so nested
 * mappings and arrays travel as JSON text and are parsed back on read.
 */

import type { StoredMetadata } from '../interfaces/VecDbClient.js';
import type { PayloadMetadata } from '../types/VectorItem.js';
import { createLogger, NAMESPACES } from '../logging.js';

const codecLog = createLogger(NAMESPACES.codec);

export interface MetadataCodec {
  encode(metadata: PayloadMetadata): StoredMetadata;
  decode(stored: StoredMetadata): PayloadMetadata;
}

export function encodeMetadata(metadata: PayloadMetadata): StoredMetadata {
  const encoded: StoredMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) {
      // backends reject null metadata values
      codecLog(`Dropping empty metadata field ${key}`);
      continue;
    }
    if (typeof value === 'string' || typeof value === 'boolean') {
      encoded[key] = value;
    } else if (typeof value === 'number') {
      if (Number.isFinite(value)) {
        encoded[key] = value;
      } else {
        encoded[key] = String(value);
      }
    } else if (typeof value === 'object') {
      encoded[key] = JSON.stringify(value);
    } else {
      encoded[key] = String(value);
    }
  }
  return encoded;
}

/**
 * Only strings that look like a JSON object or array are parsed. A parse
 * failure, or a scalar result, keeps the stored string as it was.
 */
export function decodeMetadataValue(value: string): unknown {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) return value;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === 'object' && parsed !== null) return parsed;
  } catch {
    codecLog(`Keeping unparseable metadata string as-is (length ${value.length})`);
  }
  return value;
}

export function decodeMetadata(stored: StoredMetadata): PayloadMetadata {
  const decoded: PayloadMetadata = {};
  for (const [key, value] of Object.entries(stored)) {
    decoded[key] = typeof value === 'string' ? decodeMetadataValue(value) : value;
  }
  return decoded;
}

export const jsonMetadataCodec: MetadataCodec = {
  encode: encodeMetadata,
  decode: decodeMetadata
};
