import type { Readable } from 'node:stream';

export type Flag = 0 | 1;

export type NodeInfo = {
  name: string;
  hash: string;
  phash?: string;
  mime: string;
  ts: number;
  size: number;
  dirs?: Flag;
  read: Flag;
  write: Flag;
  locked: Flag;
  volumeid?: string;
};

export type RequestValue = string | string[];

export type UploadedFile = {
  fieldName: string;
  filename: string;
  mimeType: string;
  stagingPath: string;
  sizeBytes: number;
};

/**
 * Transport-neutral view of an incoming request. The HTTP layer fills it from Fastify; tests
 * build it directly.
 */
export type ConnectorRequest = {
  method: string;
  query: Record<string, RequestValue | undefined>;
  body: Record<string, RequestValue | undefined>;
  files: UploadedFile[];
};

export type FileView = {
  name: string;
  mimeType: string;
  sizeBytes: number;
  lastModifiedAt: Date | null;
  disposition: 'inline' | 'attachment';
  stream: Readable;
};

export type ArchiverCapabilities = {
  create: string[];
  extract: string[];
};

export type CapabilityAdvertisement = {
  api: string;
  uplMaxSize: string;
  options: {
    separator: string;
    disabled: string[];
    archivers: ArchiverCapabilities;
    copyOverwrite: Flag;
  };
};

export type ResponseEnvelope = Partial<CapabilityAdvertisement> & {
  cwd?: NodeInfo;
  files?: NodeInfo[];
  tree?: NodeInfo[];
  list?: NodeInfo[];
  added?: NodeInfo[];
  removed?: string[];
  error?: string;
};

export type ConnectorResult =
  | {
      kind: 'json';
      command: string | null;
      status: number;
      headers: Record<string, string>;
      body: ResponseEnvelope;
    }
  | {
      kind: 'view';
      command: string | null;
      status: number;
      view: FileView;
    };
