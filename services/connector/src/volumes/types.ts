import type { ConnectorRequest, FileView, NodeInfo, UploadedFile } from '../types';

export type TreeOptions = {
  ancestors?: boolean;
  siblings?: boolean;
};

export type VolumeChanges = {
  added?: NodeInfo[];
  removed?: string[];
};

/**
 * Capability contract every storage backend satisfies. Targets passed in are local targets
 * (the part of a hash after the volume prefix); the empty target denotes the volume root.
 * Hashes the driver hands back are full identifiers including its own volume id.
 */
export interface VolumeDriver {
  readonly id: string;
  readonly alias: string;
  /** Absolute storage root; present only on filesystem-backed drivers. */
  readonly rootPath?: string;
  getInfo(target: string): Promise<NodeInfo>;
  getTree(target: string, options?: TreeOptions): Promise<NodeInfo[]>;
  list(target: string): Promise<NodeInfo[]>;
  mkdir(name: string, parent: string): Promise<NodeInfo>;
  mkfile(name: string, parent: string): Promise<NodeInfo>;
  rename(name: string, target: string): Promise<VolumeChanges>;
  paste(targets: string[], source: string, destination: string, cut: boolean): Promise<VolumeChanges>;
  remove(target: string): Promise<string>;
  upload(files: UploadedFile[], parent: string): Promise<VolumeChanges>;
  resolveAbsolutePath(target: string): Promise<string | null>;
  readFileView(request: ConnectorRequest, target: string): Promise<FileView>;
}
