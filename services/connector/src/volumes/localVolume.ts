import { createReadStream, promises as fs, type Stats } from 'node:fs';
import path from 'node:path';
import { ConnectorError, isErrnoException } from '../errors';
import type { ConnectorRequest, FileView, NodeInfo, UploadedFile } from '../types';
import { DIRECTORY_MIME_TYPE, lookupMimeType } from '../utils/mime';
import {
  getLineage,
  getNodeName,
  getParentPath,
  isSameOrDescendant,
  joinRelativePath,
  normalizeRelativePath,
  validateNodeName
} from '../utils/path';
import { HASH_SEPARATOR, encodeHash } from './hash';
import type { TreeOptions, VolumeChanges, VolumeDriver } from './types';

export type LocalVolumeOptions = {
  id: string;
  rootPath: string;
  alias?: string;
  copyOverwrite?: boolean;
};

type LocatedNode = {
  relative: string;
  absolute: string;
  stats: Stats;
};

async function statOptional(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (err) {
    if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      return null;
    }
    throw err;
  }
}

async function copyDirectoryRecursive(source: string, destination: string): Promise<void> {
  await fs.mkdir(destination, { recursive: true });
  const entries = await fs.readdir(source, { withFileTypes: true });
  for (const entry of entries) {
    const sourcePath = path.join(source, entry.name);
    const destinationPath = path.join(destination, entry.name);
    if (entry.isDirectory()) {
      await copyDirectoryRecursive(sourcePath, destinationPath);
    } else {
      await fs.copyFile(sourcePath, destinationPath);
    }
  }
}

async function moveReplacing(source: string, destination: string, isDirectory: boolean): Promise<void> {
  try {
    await fs.rename(source, destination);
  } catch (err) {
    if (!isErrnoException(err) || err.code !== 'EXDEV') {
      throw err;
    }
    if (isDirectory) {
      await copyDirectoryRecursive(source, destination);
      await fs.rm(source, { recursive: true, force: true });
    } else {
      await fs.copyFile(source, destination);
      await fs.unlink(source);
    }
  }
}

function compareNodes(left: NodeInfo, right: NodeInfo): number {
  const leftIsDirectory = left.mime === DIRECTORY_MIME_TYPE;
  const rightIsDirectory = right.mime === DIRECTORY_MIME_TYPE;
  if (leftIsDirectory !== rightIsDirectory) {
    return leftIsDirectory ? -1 : 1;
  }
  if (left.name === right.name) {
    return 0;
  }
  return left.name < right.name ? -1 : 1;
}

function buildCopyName(name: string, attempt: number): string {
  const extension = path.extname(name);
  const stem = extension && extension !== name ? name.slice(0, -extension.length) : name;
  const suffix = extension && extension !== name ? extension : '';
  return `${stem} copy ${attempt}${suffix}`;
}

/**
 * Volume backed by a directory on the local filesystem. Local targets are the base64url
 * encoding of the volume-relative path with a leading slash.
 */
export class LocalVolumeDriver implements VolumeDriver {
  readonly id: string;
  readonly alias: string;
  readonly rootPath: string;
  private readonly copyOverwrite: boolean;

  constructor(options: LocalVolumeOptions) {
    this.id = options.id;
    this.rootPath = path.resolve(options.rootPath);
    this.alias = options.alias ?? (path.basename(this.rootPath) || options.id);
    this.copyOverwrite = options.copyOverwrite ?? true;
  }

  encodeTarget(relativePath: string): string {
    return Buffer.from(`/${normalizeRelativePath(relativePath)}`, 'utf8').toString('base64url');
  }

  hashFor(relativePath: string): string {
    return encodeHash(this.id, this.encodeTarget(relativePath));
  }

  private decodeTarget(target: string): string {
    if (target === '') {
      return '';
    }
    const decoded = Buffer.from(target, 'base64url').toString('utf8');
    if (!decoded.startsWith('/')) {
      throw new ConnectorError('Invalid target', 'INVALID_PATH', { target });
    }
    return normalizeRelativePath(decoded);
  }

  private toAbsolute(relativePath: string): string {
    const resolved = path.resolve(this.rootPath, ...relativePath.split('/').filter(Boolean));
    if (resolved !== this.rootPath && !resolved.startsWith(`${this.rootPath}${path.sep}`)) {
      throw new ConnectorError('Resolved path escapes volume root', 'INVALID_PATH', {
        requestedPath: relativePath
      });
    }
    return resolved;
  }

  private async locate(target: string): Promise<LocatedNode> {
    const relative = this.decodeTarget(target);
    return this.locateRelative(relative);
  }

  private async locateRelative(relative: string): Promise<LocatedNode> {
    const absolute = this.toAbsolute(relative);
    const stats = await statOptional(absolute);
    if (!stats) {
      throw new ConnectorError('File not found', 'NODE_NOT_FOUND', { path: relative });
    }
    return { relative, absolute, stats };
  }

  private async locateDirectory(target: string): Promise<LocatedNode> {
    const node = await this.locate(target);
    if (!node.stats.isDirectory()) {
      throw new ConnectorError('Target is not a folder', 'NOT_A_DIRECTORY', { path: node.relative });
    }
    return node;
  }

  private async hasSubdirectories(absolute: string): Promise<boolean> {
    const entries = await fs.readdir(absolute, { withFileTypes: true });
    return entries.some((entry) => entry.isDirectory());
  }

  private async describe(node: LocatedNode): Promise<NodeInfo> {
    const isRoot = node.relative === '';
    const isDirectory = node.stats.isDirectory();
    const name = isRoot ? this.alias : getNodeName(node.relative);
    const info: NodeInfo = {
      name,
      hash: this.hashFor(node.relative),
      mime: isDirectory ? DIRECTORY_MIME_TYPE : lookupMimeType(name),
      ts: Math.floor(node.stats.mtimeMs / 1000),
      size: isDirectory ? 0 : node.stats.size,
      read: 1,
      write: 1,
      locked: isRoot ? 1 : 0
    };
    if (isRoot) {
      info.volumeid = `${this.id}${HASH_SEPARATOR}`;
    } else {
      info.phash = this.hashFor(getParentPath(node.relative));
    }
    if (isDirectory) {
      info.dirs = (await this.hasSubdirectories(node.absolute)) ? 1 : 0;
    }
    return info;
  }

  private async describeRelative(relative: string): Promise<NodeInfo> {
    return this.describe(await this.locateRelative(relative));
  }

  private async listChildren(relative: string): Promise<NodeInfo[]> {
    const absolute = this.toAbsolute(relative);
    const entries = await fs.readdir(absolute);
    const children: NodeInfo[] = [];
    for (const entry of entries) {
      const childRelative = joinRelativePath(relative, entry);
      const childAbsolute = path.join(absolute, entry);
      const stats = await statOptional(childAbsolute);
      if (!stats) {
        // dangling symlink
        continue;
      }
      children.push(await this.describe({ relative: childRelative, absolute: childAbsolute, stats }));
    }
    return children.sort(compareNodes);
  }

  async getInfo(target: string): Promise<NodeInfo> {
    return this.describe(await this.locate(target));
  }

  async getTree(target: string, options?: TreeOptions): Promise<NodeInfo[]> {
    const { relative } = await this.locateDirectory(target);
    const nodes = new Map<string, NodeInfo>();
    const add = (info: NodeInfo) => {
      if (!nodes.has(info.hash)) {
        nodes.set(info.hash, info);
      }
    };

    const chain = options?.ancestors ? getLineage(relative) : [relative];
    for (const level of chain) {
      if (options?.ancestors) {
        add(await this.describeRelative(level));
      }
      if (options?.siblings && level !== '') {
        for (const sibling of await this.listChildren(getParentPath(level))) {
          if (sibling.mime === DIRECTORY_MIME_TYPE) {
            add(sibling);
          }
        }
      }
    }

    for (const child of await this.listChildren(relative)) {
      add(child);
    }
    return Array.from(nodes.values());
  }

  async list(target: string): Promise<NodeInfo[]> {
    const { relative } = await this.locateDirectory(target);
    return this.listChildren(relative);
  }

  private async prepareChild(name: string, parent: string): Promise<{ relative: string; absolute: string }> {
    const validName = validateNodeName(name);
    const directory = await this.locateDirectory(parent);
    const relative = joinRelativePath(directory.relative, validName);
    const absolute = this.toAbsolute(relative);
    if (await statOptional(absolute)) {
      throw new ConnectorError(`File named "${validName}" already exists`, 'NODE_EXISTS', { path: relative });
    }
    return { relative, absolute };
  }

  async mkdir(name: string, parent: string): Promise<NodeInfo> {
    const child = await this.prepareChild(name, parent);
    await fs.mkdir(child.absolute);
    return this.describeRelative(child.relative);
  }

  async mkfile(name: string, parent: string): Promise<NodeInfo> {
    const child = await this.prepareChild(name, parent);
    await fs.writeFile(child.absolute, '', { flag: 'wx' });
    return this.describeRelative(child.relative);
  }

  async rename(name: string, target: string): Promise<VolumeChanges> {
    const node = await this.locate(target);
    if (node.relative === '') {
      throw new ConnectorError('Volume root cannot be renamed', 'NOT_PERMITTED');
    }
    const previousHash = this.hashFor(node.relative);
    const renamed = await this.prepareChild(name, this.encodeTarget(getParentPath(node.relative)));
    await fs.rename(node.absolute, renamed.absolute);
    return {
      added: [await this.describeRelative(renamed.relative)],
      removed: [previousHash]
    };
  }

  private async findFreeCopyName(directory: string, name: string): Promise<string> {
    for (let attempt = 1; ; attempt += 1) {
      const candidate = buildCopyName(name, attempt);
      if (!(await statOptional(this.toAbsolute(joinRelativePath(directory, candidate))))) {
        return candidate;
      }
    }
  }

  async paste(targets: string[], source: string, destination: string, cut: boolean): Promise<VolumeChanges> {
    await this.locateDirectory(source);
    const destinationDirectory = await this.locateDirectory(destination);
    const added: NodeInfo[] = [];
    const removed: string[] = [];

    for (const target of targets) {
      const node = await this.locate(target);
      if (node.relative === '') {
        throw new ConnectorError('Volume root cannot be moved or copied', 'NOT_PERMITTED');
      }
      const isDirectory = node.stats.isDirectory();
      if (isDirectory && isSameOrDescendant(destinationDirectory.relative, node.relative)) {
        throw new ConnectorError('Cannot paste a folder into itself', 'INVALID_PATH', { path: node.relative });
      }

      let name = getNodeName(node.relative);
      if (getParentPath(node.relative) === destinationDirectory.relative) {
        if (cut) {
          continue;
        }
        name = await this.findFreeCopyName(destinationDirectory.relative, name);
      }

      const destinationRelative = joinRelativePath(destinationDirectory.relative, name);
      if (isSameOrDescendant(node.relative, destinationRelative)) {
        throw new ConnectorError('Cannot replace a folder that contains the pasted item', 'INVALID_PATH', {
          path: node.relative
        });
      }
      const destinationAbsolute = this.toAbsolute(destinationRelative);
      if (await statOptional(destinationAbsolute)) {
        if (!this.copyOverwrite) {
          throw new ConnectorError(`File named "${name}" already exists`, 'NODE_EXISTS', {
            path: destinationRelative
          });
        }
        await fs.rm(destinationAbsolute, { recursive: true, force: true });
        removed.push(this.hashFor(destinationRelative));
      }

      if (cut) {
        await moveReplacing(node.absolute, destinationAbsolute, isDirectory);
        removed.push(this.hashFor(node.relative));
      } else if (isDirectory) {
        await copyDirectoryRecursive(node.absolute, destinationAbsolute);
      } else {
        await fs.copyFile(node.absolute, destinationAbsolute);
      }
      added.push(await this.describeRelative(destinationRelative));
    }

    return { added, removed };
  }

  async remove(target: string): Promise<string> {
    const node = await this.locate(target);
    if (node.relative === '') {
      throw new ConnectorError('Volume root cannot be removed', 'NOT_PERMITTED');
    }
    await fs.rm(node.absolute, { recursive: true, force: true });
    return this.hashFor(node.relative);
  }

  async upload(files: UploadedFile[], parent: string): Promise<VolumeChanges> {
    if (files.length === 0) {
      throw new ConnectorError('No files were uploaded', 'INVALID_ARGUMENTS');
    }
    const directory = await this.locateDirectory(parent);
    const added: NodeInfo[] = [];

    for (const file of files) {
      const name = validateNodeName(path.basename(file.filename.replace(/\\/g, '/')));
      const relative = joinRelativePath(directory.relative, name);
      const absolute = this.toAbsolute(relative);
      const existing = await statOptional(absolute);
      if (existing?.isDirectory()) {
        throw new ConnectorError('Cannot overwrite directory with file', 'NOT_A_DIRECTORY', { path: relative });
      }
      if (existing) {
        await fs.unlink(absolute);
      }
      await moveReplacing(file.stagingPath, absolute, false);
      added.push(await this.describeRelative(relative));
    }

    return { added };
  }

  async resolveAbsolutePath(target: string): Promise<string | null> {
    return this.toAbsolute(this.decodeTarget(target));
  }

  async readFileView(request: ConnectorRequest, target: string): Promise<FileView> {
    const node = await this.locate(target);
    if (!node.stats.isFile()) {
      throw new ConnectorError('Requested node is not a file', 'NOT_SUPPORTED', { path: node.relative });
    }
    const download = request.query.download ?? request.body.download;
    const name = getNodeName(node.relative);
    return {
      name,
      mimeType: lookupMimeType(name),
      sizeBytes: node.stats.size,
      lastModifiedAt: node.stats.mtime,
      disposition: download === '1' ? 'attachment' : 'inline',
      stream: createReadStream(node.absolute)
    };
  }
}
