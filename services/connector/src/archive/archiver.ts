import { promises as fs } from 'node:fs';
import path from 'node:path';
import JSZip from 'jszip';
import * as tar from 'tar';
import type { ReadEntry } from 'tar';
import { ConnectorError, assertUnreachable } from '../errors';

export type ArchiveFormat = 'zip' | 'tar' | 'tgz';

export const ARCHIVE_MIME_TYPES = {
  'application/zip': 'zip',
  'application/x-tar': 'tar',
  'application/x-gzip': 'tgz'
} as const satisfies Record<string, ArchiveFormat>;

export type ArchiveMimeType = keyof typeof ARCHIVE_MIME_TYPES;

export function isArchiveMimeType(value: string): value is ArchiveMimeType {
  return Object.prototype.hasOwnProperty.call(ARCHIVE_MIME_TYPES, value);
}

export function detectArchiveMimeType(fileName: string): ArchiveMimeType | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith('.zip')) {
    return 'application/zip';
  }
  if (lower.endsWith('.tgz') || lower.endsWith('.tar.gz')) {
    return 'application/x-gzip';
  }
  if (lower.endsWith('.tar')) {
    return 'application/x-tar';
  }
  return null;
}

function isWithinDirectory(candidate: string, directory: string): boolean {
  const prefix = directory.endsWith(path.sep) ? directory : `${directory}${path.sep}`;
  return candidate.startsWith(prefix);
}

function findCommonParent(paths: string[]): string {
  let parent = path.dirname(paths[0]);
  for (const candidate of paths.slice(1)) {
    while (!isWithinDirectory(candidate, parent)) {
      parent = path.dirname(parent);
    }
  }
  return parent;
}

function toEntryName(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

function assertSafeEntryName(name: string): string {
  const normalized = name.replace(/\\/g, '/');
  if (normalized.startsWith('/') || normalized.split('/').includes('..')) {
    throw new ConnectorError('Unsafe path detected while extracting archive', 'INVALID_PATH', { entry: name });
  }
  return normalized;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function addToZip(zip: JSZip, absolute: string, entryName: string): Promise<void> {
  const stats = await fs.stat(absolute);
  if (stats.isDirectory()) {
    zip.folder(entryName);
    const children = (await fs.readdir(absolute)).sort();
    for (const child of children) {
      await addToZip(zip, path.join(absolute, child), `${entryName}/${child}`);
    }
    return;
  }
  zip.file(entryName, await fs.readFile(absolute), { date: stats.mtime });
}

async function createZip(archivePath: string, cwd: string, entries: string[]): Promise<void> {
  const zip = new JSZip();
  for (const entry of entries) {
    await addToZip(zip, path.join(cwd, entry), toEntryName(entry));
  }
  const buffer = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  await fs.writeFile(archivePath, buffer, { flag: 'wx' });
}

async function extractZip(archivePath: string, outputDirectory: string): Promise<void> {
  const zip = await JSZip.loadAsync(await fs.readFile(archivePath));
  for (const entry of Object.values(zip.files)) {
    const name = assertSafeEntryName(entry.name);
    const destination = path.join(outputDirectory, ...name.split('/').filter(Boolean));
    if (entry.dir) {
      await fs.mkdir(destination, { recursive: true });
      continue;
    }
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await fs.writeFile(destination, await entry.async('nodebuffer'));
  }
}

/**
 * Writes an archive of `sources` (absolute paths) to `archivePath`. Entries are stored relative
 * to the closest directory containing every source.
 */
export async function createArchive(
  mimeType: ArchiveMimeType,
  archivePath: string,
  sources: string[]
): Promise<void> {
  if (sources.length === 0) {
    throw new ConnectorError('Nothing to archive', 'INVALID_ARGUMENTS');
  }
  if (await pathExists(archivePath)) {
    throw new ConnectorError(`File named "${path.basename(archivePath)}" already exists`, 'NODE_EXISTS');
  }

  const cwd = findCommonParent(sources);
  const entries = sources.map((source) => path.relative(cwd, source));
  const format = ARCHIVE_MIME_TYPES[mimeType];

  switch (format) {
    case 'zip':
      await createZip(archivePath, cwd, entries);
      return;
    case 'tar':
    case 'tgz':
      await tar.create(
        {
          file: archivePath,
          cwd,
          gzip: format === 'tgz',
          portable: true,
          // the archive may be written inside one of the folders it covers
          filter: (entryPath: string) => path.resolve(cwd, entryPath) !== archivePath
        },
        entries
      );
      return;
    default:
      assertUnreachable(format);
  }
}

export async function extractArchive(archivePath: string, outputDirectory: string): Promise<void> {
  const mimeType = detectArchiveMimeType(path.basename(archivePath));
  if (!mimeType) {
    throw new ConnectorError('Unsupported archive type', 'UNSUPPORTED_ARCHIVE', {
      name: path.basename(archivePath)
    });
  }

  const format = ARCHIVE_MIME_TYPES[mimeType];
  switch (format) {
    case 'zip':
      await extractZip(archivePath, outputDirectory);
      return;
    case 'tar':
    case 'tgz':
      await tar.x({
        file: archivePath,
        cwd: outputDirectory,
        strict: true,
        preservePaths: false,
        onentry: (entry: ReadEntry) => {
          assertSafeEntryName(entry.path);
        }
      });
      return;
    default:
      assertUnreachable(format);
  }
}
