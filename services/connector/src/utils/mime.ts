import path from 'node:path';
import mimeTypeTable from './mimeTypes.json';

export const DIRECTORY_MIME_TYPE = 'directory';
export const DEFAULT_MIME_TYPE = 'application/octet-stream';

const mimeTypes: Record<string, string> = mimeTypeTable;

export function lookupMimeType(fileName: string): string {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.tar.gz')) {
    return mimeTypes['.tgz'] ?? DEFAULT_MIME_TYPE;
  }
  const extension = path.extname(lower);
  if (!extension) {
    return DEFAULT_MIME_TYPE;
  }
  return mimeTypes[extension] ?? DEFAULT_MIME_TYPE;
}
