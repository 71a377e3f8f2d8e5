import crypto from 'crypto';
import path from 'path';

function shortHash(value: string, length = 8): string {
  return crypto.createHash('sha256').update(value).digest('base64url').substring(0, length);
}

export function toSourceId(filePath: string): string {
  // Readable stem plus a hash of the absolute path, so equal names in different folders stay apart
  const stem = path
    .basename(filePath, path.extname(filePath))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `${stem || 'source'}-${shortHash(path.resolve(filePath))}`;
}

export function toChunkId(sourceId: string, index: number): string {
  return `${sourceId}-${String(index).padStart(4, '0')}`;
}

export function toJobId(inputDir: string): string {
  return `job-${shortHash(path.resolve(inputDir), 12)}`;
}
