import type { NodeInfo } from '../types';
import { buildCapabilityAdvertisement } from './capabilities';
import type { CommandContext, CommandOutcome, ParamsWith } from './types';

type TargetContext = CommandContext<ParamsWith<'target'>>;

function appendUnique(nodes: NodeInfo[], seen: Set<string>, additions: NodeInfo[]): void {
  for (const node of additions) {
    if (!seen.has(node.hash)) {
      seen.add(node.hash);
      nodes.push(node);
    }
  }
}

/**
 * An empty target means the widget is loading for the first time: the first volume's root
 * becomes the cwd and every volume contributes its root and tree to `files`.
 */
export async function openCommand({ params, volumes, response, settings }: TargetContext): Promise<void> {
  const includeTree = params.tree === '1';
  const treeOptions = { ancestors: includeTree, siblings: includeTree };

  if (params.target === '') {
    response.cwd = await volumes.getDefault().getInfo('');
    const files: NodeInfo[] = [];
    const seen = new Set<string>();
    for (const volume of volumes.list()) {
      appendUnique(files, seen, [await volume.getInfo('')]);
      appendUnique(files, seen, await volume.getTree('', treeOptions));
    }
    response.files = files;
  } else {
    const { volume, target } = volumes.resolve(params.target);
    response.cwd = await volume.getInfo(target);
    response.files = await volume.getTree(target, treeOptions);
  }

  if (params.init !== undefined) {
    Object.assign(response, buildCapabilityAdvertisement(settings));
  }
}

export async function treeCommand({ params, volumes, response }: TargetContext): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  response.tree = await volume.getTree(target);
}

/** Flat list; the client rebuilds the hierarchy from hash/phash. */
export async function parentsCommand({ params, volumes, response }: TargetContext): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  response.tree = await volume.getTree(target, { ancestors: true, siblings: true });
}

export async function listCommand({ params, volumes, response }: TargetContext): Promise<void> {
  const { volume, target } = volumes.resolve(params.target);
  response.list = await volume.list(target);
}

export async function fileCommand({ params, volumes, request }: TargetContext): Promise<CommandOutcome> {
  const { volume, target } = volumes.resolve(params.target);
  return { view: await volume.readFileView(request, target) };
}
