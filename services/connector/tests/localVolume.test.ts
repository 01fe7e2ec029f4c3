import assert from 'node:assert/strict';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test, { type TestContext } from 'node:test';
import { ConnectorError, type ConnectorErrorCode } from '../src/errors';
import type { ConnectorRequest } from '../src/types';
import { LocalVolumeDriver } from '../src/volumes/localVolume';
import { VolumeRegistry } from '../src/volumes/registry';

async function createVolume(t: TestContext, options: { copyOverwrite?: boolean } = {}) {
  const root = await mkdtemp(path.join(tmpdir(), 'connector-local-volume-'));
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });
  const volume = new LocalVolumeDriver({ id: 'l1', rootPath: root, alias: 'Files', ...options });
  return { root, volume, target: (relative: string) => volume.encodeTarget(relative) };
}

function hasCode(code: ConnectorErrorCode, message?: string) {
  return (err: unknown) =>
    err instanceof ConnectorError && err.code === code && (message === undefined || err.message === message);
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

const emptyRequest: ConnectorRequest = { method: 'GET', query: {}, body: {}, files: [] };

test('targets are base64url paths with a leading slash', () => {
  const volume = new LocalVolumeDriver({ id: 'l1', rootPath: '/srv/files' });
  assert.equal(volume.encodeTarget(''), 'Lw');
  assert.equal(volume.encodeTarget('docs'), 'L2RvY3M');
  assert.equal(volume.hashFor('docs'), 'l1_L2RvY3M');
  assert.equal(volume.alias, 'files');
});

test('describes the root as a locked volume entry', async (t) => {
  const { volume } = await createVolume(t);
  const root = await volume.getInfo('');
  assert.equal(root.name, 'Files');
  assert.equal(root.hash, 'l1_Lw');
  assert.equal(root.mime, 'directory');
  assert.equal(root.locked, 1);
  assert.equal(root.volumeid, 'l1_');
  assert.equal(root.dirs, 0);
  assert.equal(root.phash, undefined);
  assert.deepEqual(await volume.getInfo('Lw'), root);
});

test('creates folders and files and lists folders first', async (t) => {
  const { volume, target } = await createVolume(t);
  await volume.mkfile('b.txt', '');
  await volume.mkfile('a.txt', '');
  await volume.mkdir('z', '');
  const folder = await volume.mkdir('c', target(''));

  assert.equal(folder.hash, volume.hashFor('c'));
  assert.equal(folder.phash, 'l1_Lw');
  assert.equal(folder.dirs, 0);
  assert.equal(folder.locked, 0);

  const listing = await volume.list('');
  assert.deepEqual(
    listing.map((node) => node.name),
    ['c', 'z', 'a.txt', 'b.txt']
  );
  assert.equal(listing[2].mime, 'text/plain');
  assert.equal(listing[2].size, 0);
  assert.equal((await volume.getInfo('')).dirs, 1);
});

test('refuses duplicate and invalid names', async (t) => {
  const { volume } = await createVolume(t);
  await volume.mkdir('a', '');
  await assert.rejects(volume.mkfile('a', ''), hasCode('NODE_EXISTS', 'File named "a" already exists'));
  await assert.rejects(volume.mkdir('..', ''), hasCode('INVALID_NAME'));
  await assert.rejects(volume.mkdir('x/y', ''), hasCode('INVALID_NAME'));
  await assert.rejects(volume.mkdir('   ', ''), hasCode('INVALID_NAME', 'Name must not be empty'));
});

test('tree adds ancestors and their sibling folders on request', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await mkdir(path.join(root, 'a', 'b'), { recursive: true });
  await mkdir(path.join(root, 'a', 'd'));
  await mkdir(path.join(root, 'e'));
  await writeFile(path.join(root, 'a', 'b', 'c.txt'), 'c');
  await writeFile(path.join(root, 'f.txt'), 'f');

  const full = await volume.getTree(target('a/b'), { ancestors: true, siblings: true });
  assert.deepEqual(
    full.map((node) => node.name),
    ['Files', 'a', 'e', 'b', 'd', 'c.txt']
  );

  const plain = await volume.getTree(target('a'));
  assert.deepEqual(
    plain.map((node) => node.name),
    ['b', 'd']
  );

  await assert.rejects(volume.getTree(target('f.txt')), hasCode('NOT_A_DIRECTORY'));
});

test('rename replaces the node hash', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await writeFile(path.join(root, 'a.txt'), 'a');

  const changes = await volume.rename('renamed.txt', target('a.txt'));
  assert.deepEqual(
    changes.added?.map((node) => node.name),
    ['renamed.txt']
  );
  assert.deepEqual(changes.removed, [volume.hashFor('a.txt')]);
  assert.equal(await readFile(path.join(root, 'renamed.txt'), 'utf8'), 'a');
  assert.equal(await exists(path.join(root, 'a.txt')), false);

  await assert.rejects(volume.rename('other', ''), hasCode('NOT_PERMITTED'));
});

test('copying into the same folder picks a free name', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await writeFile(path.join(root, 'a.txt'), 'a');

  const first = await volume.paste([target('a.txt')], '', '', false);
  assert.deepEqual(
    first.added?.map((node) => node.name),
    ['a copy 1.txt']
  );
  assert.deepEqual(first.removed, []);

  const second = await volume.paste([target('a.txt')], '', '', false);
  assert.deepEqual(
    second.added?.map((node) => node.name),
    ['a copy 2.txt']
  );

  const moved = await volume.paste([target('a.txt')], '', '', true);
  assert.deepEqual(moved, { added: [], removed: [] });
});

test('cut moves nodes and reports the source as removed', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await mkdir(path.join(root, 'dest'));
  await mkdir(path.join(root, 'folder'));
  await writeFile(path.join(root, 'folder', 'x.txt'), 'x');

  const changes = await volume.paste([target('folder')], '', target('dest'), true);
  assert.deepEqual(changes.removed, [volume.hashFor('folder')]);
  assert.equal(changes.added?.[0]?.hash, volume.hashFor('dest/folder'));
  assert.equal(changes.added?.[0]?.phash, volume.hashFor('dest'));
  assert.equal(await readFile(path.join(root, 'dest', 'folder', 'x.txt'), 'utf8'), 'x');
  assert.equal(await exists(path.join(root, 'folder')), false);
});

test('copy overwrites an existing destination when allowed', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await mkdir(path.join(root, 'dest'));
  await writeFile(path.join(root, 'a.txt'), 'new');
  await writeFile(path.join(root, 'dest', 'a.txt'), 'old');

  const changes = await volume.paste([target('a.txt')], '', target('dest'), false);
  assert.deepEqual(changes.removed, [volume.hashFor('dest/a.txt')]);
  assert.equal(await readFile(path.join(root, 'dest', 'a.txt'), 'utf8'), 'new');
  assert.equal(await readFile(path.join(root, 'a.txt'), 'utf8'), 'new');
});

test('copy refuses an existing destination when overwriting is off', async (t) => {
  const { root, volume, target } = await createVolume(t, { copyOverwrite: false });
  await mkdir(path.join(root, 'dest'));
  await writeFile(path.join(root, 'a.txt'), 'new');
  await writeFile(path.join(root, 'dest', 'a.txt'), 'old');

  await assert.rejects(
    volume.paste([target('a.txt')], '', target('dest'), false),
    hasCode('NODE_EXISTS', 'File named "a.txt" already exists')
  );
  assert.equal(await readFile(path.join(root, 'dest', 'a.txt'), 'utf8'), 'old');
});

test('a folder cannot be pasted into itself', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await mkdir(path.join(root, 'a', 'b'), { recursive: true });
  await assert.rejects(
    volume.paste([target('a')], '', target('a/b'), false),
    hasCode('INVALID_PATH', 'Cannot paste a folder into itself')
  );
  await assert.rejects(volume.paste([''], '', target('a'), false), hasCode('NOT_PERMITTED'));
});

test('pasting never replaces a folder that holds the pasted item', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await mkdir(path.join(root, 'x'));
  await writeFile(path.join(root, 'x', 'x'), 'inner');
  await writeFile(path.join(root, 'x', 'other.txt'), 'sibling');

  for (const cut of [false, true]) {
    await assert.rejects(
      volume.paste([target('x/x')], target('x'), '', cut),
      hasCode('INVALID_PATH', 'Cannot replace a folder that contains the pasted item')
    );
  }
  assert.equal(await readFile(path.join(root, 'x', 'x'), 'utf8'), 'inner');
  assert.equal(await readFile(path.join(root, 'x', 'other.txt'), 'utf8'), 'sibling');
});

test('remove deletes recursively and protects the root', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await mkdir(path.join(root, 'a', 'b'), { recursive: true });
  await writeFile(path.join(root, 'a', 'b', 'c.txt'), 'c');

  assert.equal(await volume.remove(target('a')), volume.hashFor('a'));
  assert.equal(await exists(path.join(root, 'a')), false);
  await assert.rejects(volume.remove(target('a')), hasCode('NODE_NOT_FOUND', 'File not found'));
  await assert.rejects(volume.remove(''), hasCode('NOT_PERMITTED', 'Volume root cannot be removed'));
});

test('upload moves staged files into place', async (t) => {
  const { root, volume } = await createVolume(t);
  const staging = await mkdtemp(path.join(tmpdir(), 'connector-staging-'));
  t.after(async () => {
    await rm(staging, { recursive: true, force: true });
  });
  const stagingPath = path.join(staging, 'part-1');
  await writeFile(stagingPath, 'hello world');
  await writeFile(path.join(root, 'hello.txt'), 'previous');

  const changes = await volume.upload(
    [{ fieldName: 'upload[]', filename: 'C:\\fakepath\\hello.txt', mimeType: 'text/plain', stagingPath, sizeBytes: 11 }],
    ''
  );
  assert.deepEqual(
    changes.added?.map((node) => [node.name, node.size]),
    [['hello.txt', 11]]
  );
  assert.equal(await readFile(path.join(root, 'hello.txt'), 'utf8'), 'hello world');
  assert.equal(await exists(stagingPath), false);
});

test('upload refuses empty batches and folder collisions', async (t) => {
  const { root, volume } = await createVolume(t);
  await mkdir(path.join(root, 'docs'));
  await assert.rejects(volume.upload([], ''), hasCode('INVALID_ARGUMENTS', 'No files were uploaded'));
  await assert.rejects(
    volume.upload(
      [{ fieldName: 'upload[]', filename: 'docs', mimeType: 'text/plain', stagingPath: path.join(root, 'x'), sizeBytes: 0 }],
      ''
    ),
    hasCode('NOT_A_DIRECTORY')
  );
});

test('file views stream contents with download disposition on request', async (t) => {
  const { root, volume, target } = await createVolume(t);
  await writeFile(path.join(root, 'notes.md'), '# notes');

  const inline = await volume.readFileView(emptyRequest, target('notes.md'));
  inline.stream.destroy();
  assert.equal(inline.disposition, 'inline');

  const view = await volume.readFileView({ ...emptyRequest, query: { download: '1' } }, target('notes.md'));
  assert.equal(view.name, 'notes.md');
  assert.equal(view.mimeType, 'text/markdown');
  assert.equal(view.sizeBytes, 7);
  assert.equal(view.disposition, 'attachment');
  const chunks: Buffer[] = [];
  for await (const chunk of view.stream) {
    chunks.push(Buffer.from(chunk));
  }
  assert.equal(Buffer.concat(chunks).toString('utf8'), '# notes');

  await assert.rejects(volume.readFileView(emptyRequest, ''), hasCode('NOT_SUPPORTED'));
});

test('targets cannot escape the volume root', async (t) => {
  const { volume } = await createVolume(t);
  const escaping = Buffer.from('/../etc', 'utf8').toString('base64url');
  const relative = Buffer.from('docs', 'utf8').toString('base64url');

  await assert.rejects(volume.getInfo(escaping), hasCode('INVALID_PATH'));
  await assert.rejects(volume.getInfo(relative), hasCode('INVALID_PATH', 'Invalid target'));
  await assert.rejects(volume.getInfo(volume.encodeTarget('missing')), hasCode('NODE_NOT_FOUND'));
  assert.equal(await volume.resolveAbsolutePath(''), volume.rootPath);
});

test('the registry reports volumes whose root cannot be read', async (t) => {
  const { root, volume } = await createVolume(t);
  const missing = new LocalVolumeDriver({ id: 'l2', rootPath: path.join(root, 'gone'), alias: 'Gone' });
  const registry = new VolumeRegistry([volume, missing]);

  const unreadable = await registry.findUnreadable();
  assert.deepEqual(
    unreadable.map(({ id, reason }) => ({ id, reason })),
    [{ id: 'l2', reason: 'NODE_NOT_FOUND' }]
  );
  assert.ok(unreadable[0].error instanceof ConnectorError);
});
