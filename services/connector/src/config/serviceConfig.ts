import { existsSync, readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ARCHIVE_MIME_TYPES, isArchiveMimeType, type ArchiveMimeType } from '../archive/archiver';
import { COMMAND_NAMES, isCommandName, type CommandName } from '../commands/registry';
import { HASH_SEPARATOR } from '../volumes/hash';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const DEFAULT_VOLUME_ID = 'l1';
const DEFAULT_VOLUME_ALIAS = 'Files';
const DEFAULT_UPLOAD_MAX_SIZE = '128M';
const ALL_ARCHIVE_MIME_TYPES = Object.keys(ARCHIVE_MIME_TYPES).filter(isArchiveMimeType);

const volumeConfigSchema = z.object({
  id: z
    .string()
    .min(1)
    .refine((value) => !value.includes(HASH_SEPARATOR), {
      message: `Volume id must not contain "${HASH_SEPARATOR}"`
    }),
  root: z.string().min(1),
  alias: z.string().min(1).optional()
});

const volumeListSchema = z.array(volumeConfigSchema).min(1);

const configSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().nonnegative(),
  logLevel: z.custom<LogLevel>((value) =>
    value === 'fatal' ||
    value === 'error' ||
    value === 'warn' ||
    value === 'info' ||
    value === 'debug' ||
    value === 'trace'
  ),
  metricsEnabled: z.boolean(),
  volumes: volumeListSchema,
  uploads: z.object({
    maxSize: z.string().min(1),
    maxSizeBytes: z.number().int().positive(),
    stagingDir: z.string().min(1)
  }),
  disabledCommands: z.array(z.custom<CommandName>((value) => typeof value === 'string' && isCommandName(value))),
  archivers: z.object({
    create: z.array(z.custom<ArchiveMimeType>((value) => typeof value === 'string' && isArchiveMimeType(value))),
    extract: z.array(z.custom<ArchiveMimeType>((value) => typeof value === 'string' && isArchiveMimeType(value)))
  }),
  copyOverwrite: z.boolean()
});

export type VolumeConfig = z.infer<typeof volumeConfigSchema>;
export type ServiceConfig = z.infer<typeof configSchema>;

let cachedConfig: ServiceConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function parseList(value: string | undefined): string[] | null {
  if (value === undefined) {
    return null;
  }
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
      return normalized;
    default:
      return 'info';
  }
}

const SIZE_UNITS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3
};

/** `128M` -> 134217728. Plain numbers are bytes. */
export function parseSize(value: string): number {
  const match = /^\s*(\d+(?:\.\d+)?)\s*([KMG]?)B?\s*$/i.exec(value);
  if (!match) {
    throw new Error(`Invalid size: ${value}`);
  }
  const multiplier = SIZE_UNITS[match[2].toUpperCase()];
  return Math.floor(Number(match[1]) * multiplier);
}

function parseVolumeList(raw: string, source: string): VolumeConfig[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`${source} must contain a JSON array of volumes: ${reason}`);
  }
  return volumeListSchema.parse(parsed);
}

function resolveVolumes(env: NodeJS.ProcessEnv): VolumeConfig[] {
  const inline = env.CONNECTOR_VOLUMES?.trim();
  if (inline) {
    return parseVolumeList(inline, 'CONNECTOR_VOLUMES');
  }

  const filePath = env.CONNECTOR_VOLUMES_FILE?.trim();
  if (filePath) {
    if (!existsSync(filePath)) {
      throw new Error(`Volume file ${filePath} does not exist`);
    }
    return parseVolumeList(readFileSync(filePath, 'utf8'), filePath);
  }

  const root = env.CONNECTOR_ROOT?.trim();
  if (root) {
    return [{ id: DEFAULT_VOLUME_ID, root, alias: env.CONNECTOR_ROOT_ALIAS?.trim() || DEFAULT_VOLUME_ALIAS }];
  }

  throw new Error('Set CONNECTOR_VOLUMES, CONNECTOR_VOLUMES_FILE or CONNECTOR_ROOT to mount at least one volume');
}

export function loadServiceConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = process.env;
  const host = env.CONNECTOR_HOST || env.HOST || '127.0.0.1';
  const port = parseNumber(env.CONNECTOR_PORT || env.PORT, 4310);
  const logLevel = resolveLogLevel(env.CONNECTOR_LOG_LEVEL);
  const metricsEnabled = parseBoolean(env.CONNECTOR_METRICS_ENABLED, true);
  const volumes = resolveVolumes(env).map((volume) => ({ ...volume, root: path.resolve(volume.root) }));
  const uploadMaxSize = env.CONNECTOR_UPLOAD_MAX_SIZE?.trim() || DEFAULT_UPLOAD_MAX_SIZE;
  const stagingDir = env.CONNECTOR_STAGING_DIR?.trim() || os.tmpdir();
  const disabledCommands = parseList(env.CONNECTOR_DISABLED_COMMANDS) ?? [];
  const archiveCreateTypes = parseList(env.CONNECTOR_ARCHIVE_CREATE_TYPES) ?? ALL_ARCHIVE_MIME_TYPES;
  const archiveExtractTypes = parseList(env.CONNECTOR_ARCHIVE_EXTRACT_TYPES) ?? ALL_ARCHIVE_MIME_TYPES;
  const copyOverwrite = parseBoolean(env.CONNECTOR_COPY_OVERWRITE, true);

  const unknownCommands = disabledCommands.filter((name) => !isCommandName(name));
  if (unknownCommands.length > 0) {
    throw new Error(
      `CONNECTOR_DISABLED_COMMANDS contains unknown commands: ${unknownCommands.join(', ')} (known: ${COMMAND_NAMES.join(', ')})`
    );
  }

  const candidateConfig = {
    host,
    port,
    logLevel,
    metricsEnabled,
    volumes,
    uploads: {
      maxSize: uploadMaxSize,
      maxSizeBytes: parseSize(uploadMaxSize),
      stagingDir
    },
    disabledCommands,
    archivers: {
      create: archiveCreateTypes,
      extract: archiveExtractTypes
    },
    copyOverwrite
  };

  cachedConfig = configSchema.parse(candidateConfig);
  return cachedConfig;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}
