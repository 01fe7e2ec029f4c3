import { ConnectorError } from '../errors';

export const HASH_SEPARATOR = '_';

export type HashParts = {
  volumeId: string;
  target: string;
};

export function encodeHash(volumeId: string, target: string): string {
  return `${volumeId}${HASH_SEPARATOR}${target}`;
}

export function splitHash(hash: string): HashParts {
  const index = hash.indexOf(HASH_SEPARATOR);
  if (index <= 0) {
    throw new ConnectorError(`Invalid target hash: ${hash}`, 'MALFORMED_IDENTIFIER', { hash });
  }
  return {
    volumeId: hash.slice(0, index),
    target: hash.slice(index + HASH_SEPARATOR.length)
  };
}
