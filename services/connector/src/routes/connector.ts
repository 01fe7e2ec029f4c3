import { randomUUID } from 'node:crypto';
import { createWriteStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { JSON_HEADERS, type Connector } from '../connector';
import { isCommandName } from '../commands/registry';
import { ConnectorError, isErrnoException } from '../errors';
import type { CommandOutcomeLabel } from '../plugins/metrics';
import type { ConnectorResult, FileView, RequestValue, UploadedFile } from '../types';

export const UPLOAD_FIELD = 'upload[]';
const UPLOAD_TOO_LARGE = 'File exceeds the maximum upload size';

export type ConnectorRouteOptions = {
  connector: Connector;
  stagingDir: string;
};

type RequestValues = Record<string, RequestValue | undefined>;

type MultipartPayload = {
  body: RequestValues;
  files: UploadedFile[];
};

function toRequestValue(value: unknown): RequestValue | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (Array.isArray(value)) {
    const entries: unknown[] = value;
    return entries.flatMap((entry) => {
      const normalized = toRequestValue(entry);
      return typeof normalized === 'string' ? [normalized] : [];
    });
  }
  return undefined;
}

/** Flattens a parsed query string or body into string and string-array values. */
export function toRequestValues(input: unknown): RequestValues {
  const values: RequestValues = {};
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return values;
  }
  const entries: Array<[string, unknown]> = Object.entries(input);
  for (const [key, value] of entries) {
    const normalized = toRequestValue(value);
    if (normalized !== undefined) {
      values[key] = normalized;
    }
  }
  return values;
}

function appendValue(values: RequestValues, key: string, value: string): void {
  const existing = values[key];
  if (existing === undefined) {
    values[key] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    values[key] = [existing, value];
  }
}

async function readMultipart(request: FastifyRequest, stagingDirectory: string): Promise<MultipartPayload> {
  try {
    return await collectParts(request, stagingDirectory);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'FST_REQ_FILE_TOO_LARGE') {
      throw new ConnectorError(UPLOAD_TOO_LARGE, 'INVALID_ARGUMENTS');
    }
    throw err;
  }
}

async function collectParts(request: FastifyRequest, stagingDirectory: string): Promise<MultipartPayload> {
  const body: RequestValues = {};
  const files: UploadedFile[] = [];

  for await (const part of request.parts()) {
    if (part.type === 'field') {
      if (typeof part.value === 'string') {
        appendValue(body, part.fieldname, part.value);
      }
      continue;
    }
    if (part.fieldname !== UPLOAD_FIELD || !part.filename) {
      part.file.resume();
      continue;
    }

    const stagingPath = path.join(stagingDirectory, randomUUID());
    await pipeline(part.file, createWriteStream(stagingPath));
    if (part.file.truncated) {
      throw new ConnectorError(UPLOAD_TOO_LARGE, 'INVALID_ARGUMENTS', { filename: part.filename });
    }
    const { size: sizeBytes } = await fs.stat(stagingPath);
    files.push({
      fieldName: part.fieldname,
      filename: part.filename,
      mimeType: part.mimetype,
      stagingPath,
      sizeBytes
    });
  }

  return { body, files };
}

function encodeContentDisposition(view: FileView): string {
  const fallback = view.name.replace(/[^\x20-\x7e]|["\\]/g, '_');
  return `${view.disposition}; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(view.name)}`;
}

function describeOutcome(result: ConnectorResult): CommandOutcomeLabel {
  return result.kind === 'json' && result.body.error !== undefined ? 'error' : 'ok';
}

function commandLabel(command: string | null): string {
  if (command === null) {
    return 'none';
  }
  return isCommandName(command) ? command : 'unknown';
}

export async function registerConnectorRoutes(app: FastifyInstance, options: ConnectorRouteOptions): Promise<void> {
  const { connector, stagingDir } = options;

  const recordCommand = (command: string | null, outcome: CommandOutcomeLabel) => {
    if (app.metrics.enabled) {
      app.metrics.commandsTotal.labels(commandLabel(command), outcome).inc();
    }
  };

  async function handleConnectorRequest(request: FastifyRequest, reply: FastifyReply) {
    let stagingDirectory: string | null = null;
    try {
      let body = toRequestValues(request.body);
      let files: UploadedFile[] = [];

      if (request.isMultipart()) {
        await fs.mkdir(stagingDir, { recursive: true });
        stagingDirectory = await fs.mkdtemp(path.join(stagingDir, 'connector-upload-'));
        try {
          ({ body, files } = await readMultipart(request, stagingDirectory));
        } catch (err) {
          if (err instanceof ConnectorError) {
            request.log.warn({ err }, 'rejected multipart upload');
            recordCommand('upload', 'error');
            reply.status(200).headers(JSON_HEADERS);
            return { error: err.message };
          }
          throw err;
        }
      }

      const result = await connector.run({
        method: request.method,
        query: toRequestValues(request.query),
        body,
        files
      });
      recordCommand(result.command, describeOutcome(result));

      if (result.kind === 'view') {
        const { view } = result;
        reply
          .status(result.status)
          .header('Content-Type', view.mimeType)
          .header('Content-Length', String(view.sizeBytes))
          .header('Content-Disposition', encodeContentDisposition(view));
        if (view.lastModifiedAt) {
          reply.header('Last-Modified', view.lastModifiedAt.toUTCString());
        }
        return reply.send(view.stream);
      }

      reply.status(result.status).headers(result.headers);
      return result.body;
    } finally {
      if (stagingDirectory) {
        await fs.rm(stagingDirectory, { recursive: true, force: true });
      }
    }
  }

  app.route({
    method: ['GET', 'POST'],
    url: '/connector',
    handler: handleConnectorRequest
  });
}
