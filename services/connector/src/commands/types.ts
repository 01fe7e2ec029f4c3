import type { FastifyBaseLogger } from 'fastify';
import type { ArchiverCapabilities, ConnectorRequest, FileView, ResponseEnvelope } from '../types';
import type { VolumeRegistry } from '../volumes/registry';

export const SCALAR_PARAMS = [
  'cmd',
  'target',
  'current',
  'tree',
  'name',
  'content',
  'src',
  'dst',
  'cut',
  'init',
  'type',
  'width',
  'height'
] as const;

export const ARRAY_PARAMS = ['targets[]', 'upload[]'] as const;

/** Legacy alias: only its first element is kept, under `name`. */
export const DIRS_ALIAS_PARAM = 'dirs[]';

export type ScalarParamName = (typeof SCALAR_PARAMS)[number];
export type ArrayParamName = (typeof ARRAY_PARAMS)[number];
export type ParamName = ScalarParamName | ArrayParamName;

export type ConnectorParams = { [K in ScalarParamName]?: string } & { [K in ArrayParamName]?: string[] };

/** `true`: must be present, `false`: must be absent, omitted: unconstrained. */
export type ParameterContract = Partial<Record<ParamName, boolean>>;

type RequiredKeys<C extends ParameterContract> = {
  [K in keyof C]-?: C[K] extends true ? K : never;
}[keyof C];

export type ParamsWith<K extends ParamName> = ConnectorParams & Required<Pick<ConnectorParams, K>>;

export type ContractParams<C extends ParameterContract> = ParamsWith<Extract<RequiredKeys<C>, ParamName>>;

export type ConnectorLogger = Pick<FastifyBaseLogger, 'error' | 'warn' | 'info' | 'debug'>;

export type ConnectorSettings = {
  uploadMaxSize: string;
  disabled: string[];
  archivers: ArchiverCapabilities;
  copyOverwrite: boolean;
};

export type CommandContext<P extends ConnectorParams = ConnectorParams> = {
  params: P;
  request: ConnectorRequest;
  volumes: VolumeRegistry;
  response: ResponseEnvelope;
  settings: ConnectorSettings;
  logger: ConnectorLogger;
};

export type CommandEnvironment = Omit<CommandContext, 'params'>;

/** Returned by handlers that render something other than the JSON envelope. */
export type CommandOutcome = {
  view: FileView;
};

export type CommandHandler<P extends ConnectorParams> = (context: CommandContext<P>) => Promise<CommandOutcome | void>;

export type PreparedCommand = (environment: CommandEnvironment) => Promise<CommandOutcome | void>;

export type CommandDescriptor = {
  readonly contract: ParameterContract;
  /** Returns null when the parameters break the contract. */
  prepare(params: ConnectorParams): PreparedCommand | null;
};
