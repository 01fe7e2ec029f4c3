import { ConnectorError } from '../errors';

const FORBIDDEN_NAME_CHARACTERS = /[/\\\0]/;

export function validateNodeName(input: string): string {
  const name = input.trim();
  if (!name) {
    throw new ConnectorError('Name must not be empty', 'INVALID_NAME');
  }
  if (name === '.' || name === '..' || FORBIDDEN_NAME_CHARACTERS.test(name)) {
    throw new ConnectorError(`Invalid name: ${input}`, 'INVALID_NAME', { name: input });
  }
  return name;
}

/**
 * Volume-relative paths are POSIX style without leading or trailing slashes; the root is ''.
 */
export function normalizeRelativePath(input: string): string {
  const segments = input.replace(/\\+/g, '/').split('/').filter((segment) => segment.length > 0 && segment !== '.');
  if (segments.includes('..')) {
    throw new ConnectorError('Path containing `..` is not supported', 'INVALID_PATH', { path: input });
  }
  return segments.join('/');
}

export function joinRelativePath(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

export function getParentPath(relativePath: string): string {
  const index = relativePath.lastIndexOf('/');
  return index === -1 ? '' : relativePath.slice(0, index);
}

export function getNodeName(relativePath: string): string {
  const segments = relativePath.split('/');
  return segments[segments.length - 1];
}

/** Root first, ending with the path itself. */
export function getLineage(relativePath: string): string[] {
  const lineage = [''];
  if (!relativePath) {
    return lineage;
  }
  const segments = relativePath.split('/');
  for (let index = 1; index <= segments.length; index += 1) {
    lineage.push(segments.slice(0, index).join('/'));
  }
  return lineage;
}

export function isSameOrDescendant(candidate: string, ancestor: string): boolean {
  if (!ancestor) {
    return true;
  }
  return candidate === ancestor || candidate.startsWith(`${ancestor}/`);
}

/** `photos.tar.gz` -> `photos` */
export function getArchiveStem(fileName: string): string {
  const [stem] = fileName.split('.');
  return stem;
}
