import type { FileBlob, TaskSlice, WorkerEndpoint } from '@scatter/shared';

/**
 * Split files into contiguous slices across endpoints
 *
 * With N files and K endpoints, the first N % K endpoints (in the order
 * given) take floor(N / K) + 1 files and the rest take floor(N / K).
 * Endpoints that would get nothing are left out, so there are never more
 * slices than files. Callers must reject empty batches and empty pools
 * before getting here.
 */
export function partitionFiles(
  files: readonly FileBlob[],
  endpoints: readonly WorkerEndpoint[]
): TaskSlice[] {
  if (endpoints.length === 0) {
    throw new RangeError('Cannot partition files across zero endpoints');
  }

  const base = Math.floor(files.length / endpoints.length);
  const remainder = files.length % endpoints.length;

  const slices: TaskSlice[] = [];
  let start = 0;

  endpoints.forEach((endpoint, i) => {
    const size = base + (i < remainder ? 1 : 0);
    if (size === 0) {
      return;
    }
    slices.push({ endpoint, files: files.slice(start, start + size) });
    start += size;
  });

  return slices;
}
