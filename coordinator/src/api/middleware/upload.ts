import type { RequestHandler } from 'express';
import multer from 'multer';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Recover a UTF-8 upload filename
 *
 * Multipart parsing reads a plain `filename="..."` parameter as latin1, so
 * UTF-8 names arrive with each byte as its own character. Names that hold
 * characters above U+00FF were already decoded and are returned as is, as
 * are byte sequences that are not valid UTF-8.
 */
export function uploadFilename(originalname: string): string {
  if (/[^\u0000-\u00ff]/.test(originalname)) {
    return originalname;
  }
  try {
    return utf8.decode(Buffer.from(originalname, 'latin1'));
  } catch {
    return originalname;
  }
}

/**
 * Multipart parser for batch uploads
 *
 * Files are held in memory; every file field is accepted here and the
 * route keeps only the one its task type expects.
 */
export function createUploadMiddleware(maxUploadBytes: number): RequestHandler {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes },
  }).any();
}
