import path from 'node:path';
import {
  ARCHIVE_MIME_TYPES,
  createArchive,
  detectArchiveMimeType,
  extractArchive,
  isArchiveMimeType
} from '../archive/archiver';
import { ConnectorError } from '../errors';
import type { NodeInfo } from '../types';
import { getArchiveStem, validateNodeName } from '../utils/path';
import type { VolumeRegistry } from '../volumes/registry';
import type { VolumeDriver } from '../volumes/types';
import type { CommandContext, ParamsWith } from './types';

async function requireAbsolutePath(volume: VolumeDriver, target: string): Promise<string> {
  const absolutePath = await volume.resolveAbsolutePath(target);
  if (!absolutePath) {
    throw new ConnectorError('Archives are not supported by this volume', 'NOT_SUPPORTED', {
      volumeId: volume.id
    });
  }
  return absolutePath;
}

/**
 * Locates freshly created nodes by re-scanning a tree and comparing resolved paths, so the
 * handlers need nothing from a driver beyond `resolveAbsolutePath`. Assumes paths are unique.
 */
async function findNodesAtPath(
  volumes: VolumeRegistry,
  nodes: NodeInfo[],
  absolutePath: string
): Promise<NodeInfo[]> {
  const matches: NodeInfo[] = [];
  for (const node of nodes) {
    const { volume, target } = volumes.resolve(node.hash);
    if ((await volume.resolveAbsolutePath(target)) === absolutePath) {
      matches.push(node);
    }
  }
  return matches;
}

export async function archiveCommand({
  params,
  volumes,
  response,
  settings
}: CommandContext<ParamsWith<'target' | 'targets[]' | 'name' | 'type'>>): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  const mimeType = params.type;
  if (!isArchiveMimeType(mimeType) || !settings.archivers.create.includes(mimeType)) {
    throw new ConnectorError(`Unsupported archive type: ${mimeType}`, 'UNSUPPORTED_ARCHIVE', { type: mimeType });
  }

  const name = validateNodeName(params.name);
  const directory = await requireAbsolutePath(volume, target);
  const archivePath = path.join(directory, `${name}.${ARCHIVE_MIME_TYPES[mimeType]}`);

  const sources: string[] = [];
  for (const hash of params['targets[]']) {
    const source = volumes.resolve(hash);
    if (source.volume !== volume) {
      throw new ConnectorError('Archiving files from another volume is not supported.', 'CROSS_VOLUME_OPERATION', {
        target: params.target,
        source: hash
      });
    }
    sources.push(await requireAbsolutePath(volume, source.target));
  }

  await createArchive(mimeType, archivePath, sources);
  response.added = await findNodesAtPath(volumes, await volume.getTree(target), archivePath);
}

export async function extractCommand({
  params,
  volumes,
  response,
  settings
}: CommandContext<ParamsWith<'target'>>): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  const archive = await volume.getInfo(target);
  const archivePath = await requireAbsolutePath(volume, target);
  const archiveName = path.basename(archivePath);

  const mimeType = detectArchiveMimeType(archiveName);
  if (!mimeType || !settings.archivers.extract.includes(mimeType)) {
    throw new ConnectorError(`Unsupported archive type: ${archive.mime}`, 'UNSUPPORTED_ARCHIVE', {
      name: archive.name
    });
  }
  if (!archive.phash) {
    throw new ConnectorError('Archive has no parent folder', 'INVALID_ARGUMENTS', { target: params.target });
  }

  const parent = volumes.resolve(archive.phash);
  const folderName = getArchiveStem(archiveName);
  const folderPath = path.join(await requireAbsolutePath(parent.volume, parent.target), folderName);

  await parent.volume.mkdir(folderName, parent.target);
  await extractArchive(archivePath, folderPath);
  response.added = await findNodesAtPath(volumes, await parent.volume.getTree(parent.target), folderPath);
}
