import { ConnectorError } from './errors';
import { extractParams, selectParameterSource } from './commands/params';
import { COMMAND_REGISTRY } from './commands/registry';
import type {
  CommandDescriptor,
  CommandOutcome,
  ConnectorLogger,
  ConnectorParams,
  ConnectorSettings
} from './commands/types';
import type { ConnectorRequest, ConnectorResult, ResponseEnvelope } from './types';
import type { VolumeRegistry } from './volumes/registry';

export const JSON_HEADERS = { 'Content-Type': 'application/json' } as const;
export const REDACTED_PATH = '...';

export type ConnectorOptions = {
  volumes: VolumeRegistry;
  settings: ConnectorSettings;
  logger: ConnectorLogger;
  commands?: Readonly<Record<string, CommandDescriptor>>;
};

function collectIdentifiers(params: ConnectorParams): string[] {
  const identifiers = [params.target, params.src, params.dst, ...(params['targets[]'] ?? [])];
  return identifiers.filter((value): value is string => typeof value === 'string' && value.length > 0);
}

/**
 * Entry point for protocol requests. Holds nothing but the volume registry, the command table
 * and settings; every `run` call works on its own parameter set and response envelope.
 */
export class Connector {
  private readonly volumes: VolumeRegistry;
  private readonly settings: ConnectorSettings;
  private readonly logger: ConnectorLogger;
  private readonly commands: ReadonlyMap<string, CommandDescriptor>;

  constructor(options: ConnectorOptions) {
    this.volumes = options.volumes;
    this.settings = options.settings;
    this.logger = options.logger;
    const disabled = new Set(options.settings.disabled);
    const table = options.commands ?? COMMAND_REGISTRY;
    this.commands = new Map(Object.entries(table).filter(([name]) => !disabled.has(name)));
  }

  listCommands(): string[] {
    return Array.from(this.commands.keys());
  }

  async run(request: ConnectorRequest): Promise<ConnectorResult> {
    const params = extractParams(selectParameterSource(request));
    const response: ResponseEnvelope = {};
    const command = params.cmd ?? null;
    const outcome = await this.dispatch(params, request, response);

    if (outcome) {
      return { kind: 'view', command, status: 200, view: outcome.view };
    }
    return { kind: 'json', command, status: 200, headers: { ...JSON_HEADERS }, body: response };
  }

  private async dispatch(
    params: ConnectorParams,
    request: ConnectorRequest,
    response: ResponseEnvelope
  ): Promise<CommandOutcome | void> {
    if (params.cmd === undefined) {
      response.error = 'No command specified';
      return;
    }
    const descriptor = this.commands.get(params.cmd);
    if (!descriptor) {
      response.error = 'Unknown command';
      return;
    }
    const invoke = descriptor.prepare(params);
    if (!invoke) {
      response.error = 'Invalid arguments';
      return;
    }

    try {
      return await invoke({
        request,
        volumes: this.volumes,
        response,
        settings: this.settings,
        logger: this.logger
      });
    } catch (err) {
      this.logger.error(
        { err, cmd: params.cmd, code: err instanceof ConnectorError ? err.code : undefined },
        'connector command failed'
      );
      response.error = this.sanitizeErrorMessage(err, params);
    }
  }

  /**
   * Replaces the storage roots of filesystem volumes referenced by the request with a
   * placeholder. Longer roots go first so nested mounts are redacted whole.
   */
  sanitizeErrorMessage(err: unknown, params: ConnectorParams): string {
    let message = err instanceof Error ? err.message : String(err);
    const roots = new Set<string>();
    // an empty target opens every mounted volume
    const volumes =
      params.target === ''
        ? this.volumes.list()
        : collectIdentifiers(params).flatMap((identifier) => this.volumes.tryResolve(identifier)?.volume ?? []);
    for (const { rootPath } of volumes) {
      if (rootPath) {
        roots.add(rootPath);
      }
    }
    for (const root of Array.from(roots).sort((left, right) => right.length - left.length)) {
      message = message.split(root).join(REDACTED_PATH);
    }
    return message;
  }
}
