import type { TaskTypeSpec } from '@scatter/shared';

/**
 * Why a single returned item was not persisted
 */
export interface ItemDecodeError {
  filename: string;
  reason:
    | 'malformed-item'
    | 'missing-payload'
    | 'invalid-base64'
    | 'invalid-utf8'
    | 'invalid-json'
    | 'write-failed';
  message: string;
}

/**
 * An item ready to be written
 */
export interface DecodedItem {
  /** Filename as reported by the worker, reduced to its last path segment */
  filename: string;

  /** Name of the file to write in the output directory */
  outputName: string;

  /** Raw bytes for binary payloads, JSON text otherwise */
  data: Uint8Array | string;
}

export type DecodeResult =
  | { ok: true; item: DecodedItem }
  | { ok: false; error: ItemDecodeError };

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode standard base64, rejecting anything outside the alphabet or
 * with broken padding. Embedded whitespace is ignored.
 */
export function decodeBase64Strict(encoded: string): Uint8Array | null {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    return null;
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Drop any directory part a worker may have put in a filename
 */
export function safeFilename(filename: string): string {
  const parts = filename.split(/[\\/]/);
  return parts[parts.length - 1] ?? '';
}

/**
 * Output filename for a given input filename
 *
 * Binary payloads keep the whole name behind a prefix; JSON payloads lose
 * their last extension and gain the type's suffix.
 */
export function outputFilename(taskType: TaskTypeSpec, filename: string): string {
  const rule = taskType.output;
  if (rule.kind === 'binary') {
    return `${rule.prefix}${filename}`;
  }
  const dot = filename.lastIndexOf('.');
  const baseName = dot === -1 ? filename : filename.slice(0, dot);
  return `${baseName}${rule.suffix}`;
}

/**
 * Validate and decode one item from a worker's `results` list
 */
export function decodeItem(raw: unknown, taskType: TaskTypeSpec): DecodeResult {
  if (typeof raw !== 'object' || raw === null || !('filename' in raw)) {
    return fail('', 'malformed-item', 'Result entry has no filename');
  }

  const reported = raw.filename;
  if (typeof reported !== 'string') {
    return fail('', 'malformed-item', 'Result filename is not a string');
  }

  const filename = safeFilename(reported);
  if (filename === '' || filename === '.' || filename === '..') {
    return fail(reported, 'malformed-item', `Unusable filename '${reported}'`);
  }

  const payload: unknown = taskType.dataKey in raw ? Reflect.get(raw, taskType.dataKey) : undefined;
  if (typeof payload !== 'string' || payload.length === 0) {
    return fail(filename, 'missing-payload', `No ${taskType.dataKey} in result`);
  }

  const bytes = decodeBase64Strict(payload);
  if (!bytes) {
    return fail(filename, 'invalid-base64', `${taskType.dataKey} is not valid base64`);
  }

  const outputName = outputFilename(taskType, filename);

  if (taskType.output.kind === 'binary') {
    return { ok: true, item: { filename, outputName, data: bytes } };
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return fail(filename, 'invalid-utf8', `${taskType.dataKey} is not valid UTF-8`);
  }

  try {
    JSON.parse(text);
  } catch (error) {
    return fail(
      filename,
      'invalid-json',
      `${taskType.dataKey} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return { ok: true, item: { filename, outputName, data: text } };
}

function fail(
  filename: string,
  reason: ItemDecodeError['reason'],
  message: string
): { ok: false; error: ItemDecodeError } {
  return { ok: false, error: { filename, reason, message } };
}
