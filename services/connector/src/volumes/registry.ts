import { ConnectorError } from '../errors';
import { HASH_SEPARATOR, splitHash } from './hash';
import type { VolumeDriver } from './types';

export type ResolvedTarget = {
  volume: VolumeDriver;
  target: string;
};

export type UnreadableVolume = {
  id: string;
  reason: string;
  error: unknown;
};

export type VolumeDescriptor = {
  id: string;
  alias: string;
  filesystem: boolean;
};

/**
 * Mounted volumes keyed by id, in registration order. Populated once at construction and
 * read-only afterwards.
 */
export class VolumeRegistry {
  private readonly volumes: ReadonlyMap<string, VolumeDriver>;

  constructor(volumes: Iterable<VolumeDriver>) {
    const mounted = new Map<string, VolumeDriver>();
    for (const volume of volumes) {
      if (!volume.id || volume.id.includes(HASH_SEPARATOR)) {
        throw new Error(`Volume id must be non-empty and must not contain "${HASH_SEPARATOR}": ${volume.id}`);
      }
      if (mounted.has(volume.id)) {
        throw new Error(`Duplicate volume id: ${volume.id}`);
      }
      mounted.set(volume.id, volume);
    }
    if (mounted.size === 0) {
      throw new Error('At least one volume must be mounted');
    }
    this.volumes = mounted;
  }

  resolve(hash: string): ResolvedTarget {
    const { volumeId, target } = splitHash(hash);
    const volume = this.volumes.get(volumeId);
    if (!volume) {
      throw new ConnectorError(`Unknown volume: ${volumeId}`, 'UNKNOWN_VOLUME', { volumeId });
    }
    return { volume, target };
  }

  tryResolve(hash: string): ResolvedTarget | null {
    try {
      return this.resolve(hash);
    } catch (err) {
      if (err instanceof ConnectorError) {
        return null;
      }
      throw err;
    }
  }

  getDefault(): VolumeDriver {
    const [first] = this.volumes.values();
    return first;
  }

  list(): VolumeDriver[] {
    return Array.from(this.volumes.values());
  }

  /** Volumes whose root cannot be described right now. */
  async findUnreadable(): Promise<UnreadableVolume[]> {
    const unreadable: UnreadableVolume[] = [];
    for (const volume of this.list()) {
      try {
        await volume.getInfo('');
      } catch (err) {
        unreadable.push({
          id: volume.id,
          reason: err instanceof ConnectorError ? err.code : 'UNREADABLE',
          error: err
        });
      }
    }
    return unreadable;
  }

  describe(): VolumeDescriptor[] {
    return this.list().map((volume) => ({
      id: volume.id,
      alias: volume.alias,
      filesystem: typeof volume.rootPath === 'string'
    }));
  }
}
