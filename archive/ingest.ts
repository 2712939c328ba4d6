/**
 * Ingestion of real files and directories into a virtual tree.
 *
 * Ingested files get `source` handles: their bytes stay on the storage
 * backend until the archive is saved.
 *
 * @module archive/ingest
 */

import type { CreateSource } from '../core/archive.js'
import type { ArchiveStorage } from '../core/backend.js'
import { EISDIR } from '../core/errors.js'
import { VirtualFile, type VirtualDirectory, type VirtualTree } from '../core/node.js'

/**
 * Recursively mirror the real directory at `sourcePath` into `parent`.
 * Entries are visited in name order.
 *
 * @throws EEXIST when a name is already taken in `parent`
 * @throws ENOTDIR when `sourcePath` is not a directory (from the storage)
 */
export async function ingestDirectory(
  storage: ArchiveStorage,
  sourcePath: string,
  tree: VirtualTree,
  parent: VirtualDirectory
): Promise<void> {
  for (const entry of await storage.readdir(sourcePath)) {
    const entryPath = storage.join(sourcePath, entry.name)
    if (entry.type === 'directory') {
      const directory = tree.createDirectory(entry.name, parent)
      await ingestDirectory(storage, entryPath, tree, directory)
    } else {
      await ingestFile(storage, entryPath, entry.name, parent)
    }
  }
}

/**
 * Add the real file at `sourcePath` to `parent` as `name`.
 *
 * @throws EEXIST when `parent` already holds a file called `name`
 * @throws EISDIR when `sourcePath` is a directory
 */
export async function ingestFile(
  storage: ArchiveStorage,
  sourcePath: string,
  name: string,
  parent: VirtualDirectory
): Promise<VirtualFile> {
  const stats = await storage.stat(sourcePath)
  if (stats.type !== 'file') {
    throw new EISDIR('create', sourcePath)
  }
  return parent.addFile(new VirtualFile(name, { kind: 'source', path: sourcePath, size: stats.size }))
}

/** Create sources that read real input */
export type IngestSource = Exclude<CreateSource, { kind: 'tree' }>

/**
 * Populate `tree` from a create source.
 *
 * - `contents`: the directory's entries become the root's entries
 * - `entries`: each file joins the root under its base name; each directory
 *   becomes a subdirectory of the root holding its whole subtree
 */
export async function ingest(
  storage: ArchiveStorage,
  source: IngestSource,
  tree: VirtualTree
): Promise<void> {
  if (source.kind === 'contents') {
    await ingestDirectory(storage, source.directory.path, tree, tree.root)
    return
  }

  for (const file of source.files) {
    await ingestFile(storage, file.path, storage.basename(file.path), tree.root)
  }
  for (const directory of source.directories) {
    const child = tree.createDirectory(storage.basename(directory.path), tree.root)
    await ingestDirectory(storage, directory.path, tree, child)
  }
}
