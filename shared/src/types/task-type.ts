/**
 * Task types accepted by the coordinator
 *
 * Each variant owns its upload field name, the key its payload comes back
 * under, and how the decoded payload is written to disk. Adding a task type
 * means adding one entry to TASK_TYPES.
 */
export type TaskType = 'image' | 'text' | 'embedding' | 'ocr' | 'audio' | 'document';

/**
 * How a returned payload is decoded and named on disk
 */
export type OutputRule =
  | {
      /** Raw bytes, written verbatim */
      kind: 'binary';
      /** Prepended to the original filename */
      prefix: string;
    }
  | {
      /** UTF-8 JSON text */
      kind: 'json';
      /** Appended to the filename without its extension */
      suffix: string;
    };

/**
 * Per-type wire and persistence data
 */
export interface TaskTypeSpec {
  name: TaskType;

  /** Multipart field carrying the files, both inbound and to workers */
  fieldName: string;

  /** Key of the base64 payload in each worker result */
  dataKey: string;

  output: OutputRule;
}

export const TASK_TYPES: Readonly<Record<TaskType, TaskTypeSpec>> = {
  image: {
    name: 'image',
    fieldName: 'images',
    dataKey: 'image_data',
    output: { kind: 'binary', prefix: 'processed_' },
  },
  text: {
    name: 'text',
    fieldName: 'texts',
    dataKey: 'analysis_data',
    output: { kind: 'json', suffix: '_analysis.json' },
  },
  embedding: {
    name: 'embedding',
    fieldName: 'texts',
    dataKey: 'embedding_data',
    output: { kind: 'json', suffix: '_embedding.json' },
  },
  ocr: {
    name: 'ocr',
    fieldName: 'images',
    dataKey: 'ocr_data',
    output: { kind: 'json', suffix: '_ocr.json' },
  },
  audio: {
    name: 'audio',
    fieldName: 'audio_files',
    dataKey: 'audio_data',
    output: { kind: 'json', suffix: '_audio_analysis.json' },
  },
  document: {
    name: 'document',
    fieldName: 'documents',
    dataKey: 'document_data',
    output: { kind: 'json', suffix: '_document_analysis.json' },
  },
};

export const TASK_TYPE_NAMES: readonly TaskType[] = [
  'image',
  'text',
  'embedding',
  'ocr',
  'audio',
  'document',
];

/**
 * Narrow an arbitrary string to a known task type
 */
export function isTaskType(value: string): value is TaskType {
  return Object.prototype.hasOwnProperty.call(TASK_TYPES, value);
}

/**
 * Default task type when a submission omits one
 */
export const DEFAULT_TASK_TYPE: TaskType = 'image';
