import { ConnectorError } from '../errors';
import type { CommandContext, ParamsWith } from './types';

type NamedTargetContext = CommandContext<ParamsWith<'target' | 'name'>>;

export async function mkdirCommand({ params, volumes, response }: NamedTargetContext): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  response.added = [await volume.mkdir(params.name, target)];
}

export async function mkfileCommand({ params, volumes, response }: NamedTargetContext): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  response.added = [await volume.mkfile(params.name, target)];
}

export async function renameCommand({ params, volumes, response }: NamedTargetContext): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  Object.assign(response, await volume.rename(params.name, target));
}

export async function pasteCommand({
  params,
  volumes,
  response
}: CommandContext<ParamsWith<'targets[]' | 'src' | 'dst' | 'cut'>>): Promise<void> {
  const source = volumes.resolve(params.src);
  const destination = volumes.resolve(params.dst);
  const crossVolume = () =>
    new ConnectorError('Moving between volumes is not supported.', 'CROSS_VOLUME_OPERATION', {
      src: params.src,
      dst: params.dst
    });

  if (source.volume !== destination.volume) {
    throw crossVolume();
  }
  const targets = params['targets[]'].map((hash) => {
    const resolved = volumes.resolve(hash);
    if (resolved.volume !== destination.volume) {
      throw crossVolume();
    }
    return resolved.target;
  });

  const cut = params.cut === '1';
  Object.assign(response, await destination.volume.paste(targets, source.target, destination.target, cut));
}

/**
 * Targets may live on different volumes, so each one is resolved on its own. Entries already
 * removed stay in `removed` if a later target fails.
 */
export async function removeCommand({
  params,
  volumes,
  response
}: CommandContext<ParamsWith<'targets[]'>>): Promise<void> {
  const removed: string[] = [];
  response.removed = removed;
  for (const hash of params['targets[]']) {
    const { volume, target } = volumes.resolve(hash);
    removed.push(await volume.remove(target));
  }
}

export async function uploadCommand({
  params,
  volumes,
  request,
  response
}: CommandContext<ParamsWith<'target'>>): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  Object.assign(response, await volume.upload(request.files, target));
}
