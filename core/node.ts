/**
 * Virtual node model: directories, files and the tree that owns them.
 *
 * A tree is a single-owner hierarchy. Each directory owns its files and
 * subdirectories; files and directories keep a back-reference to their
 * parent that is a relation only. Full paths are never stored; they are
 * derived by walking ancestors.
 *
 * @module core/node
 */

import { ROOT_INDEX, ROOT_NAME } from './constants.js'
import { EEXIST } from './errors.js'
import { joinPath, validateName } from './path.js'
import type { FileContent } from './types.js'

// =============================================================================
// Index Sequence
// =============================================================================

/**
 * Monotonic directory index source owned by a single tree.
 *
 * Indices disambiguate directories that share a name at different paths.
 */
export class IndexSequence {
  private current: number

  constructor(start: number = ROOT_INDEX) {
    this.current = start
  }

  /** Return the next index and advance. */
  next(): number {
    return this.current++
  }
}

// =============================================================================
// VirtualFile
// =============================================================================

export class VirtualFile {
  readonly name: string

  /** Opaque content handle interpreted by the archive backend */
  content: FileContent

  private owner: VirtualDirectory | undefined

  constructor(name: string, content: FileContent) {
    validateName(name, 'createFile')
    this.name = name
    this.content = content
  }

  /** Owning directory, or undefined once detached. */
  get directory(): VirtualDirectory | undefined {
    return this.owner
  }

  /**
   * Full virtual path: the bare name for files owned by a root, otherwise
   * the owning directory's full path plus the name.
   */
  get fullPath(): string {
    return this.owner ? joinPath(this.owner.fullPath, this.name) : this.name
  }

  /** Size in bytes of the content as stored. */
  get size(): number {
    return this.content.kind === 'buffered' ? this.content.data.length : this.content.size
  }

  /** @internal */
  attach(directory: VirtualDirectory | undefined): void {
    this.owner = directory
  }
}

// =============================================================================
// VirtualDirectory
// =============================================================================

export class VirtualDirectory {
  readonly name: string

  /** Unique within the owning tree */
  readonly index: number

  private readonly fileList: VirtualFile[] = []
  private readonly directoryList: VirtualDirectory[] = []
  private parentRef: VirtualDirectory | undefined

  /**
   * Directories are created through `VirtualTree`, which owns the index
   * sequence.
   */
  constructor(name: string, index: number) {
    this.name = name
    this.index = index
  }

  get parent(): VirtualDirectory | undefined {
    return this.parentRef
  }

  get isRoot(): boolean {
    return this.parentRef === undefined
  }

  /**
   * Names of every ancestor below the root, joined with the separator.
   * The root's full path is empty.
   */
  get fullPath(): string {
    const names: string[] = []
    let node: VirtualDirectory | undefined = this
    while (node && node.parentRef) {
      names.unshift(node.name)
      node = node.parentRef
    }
    return joinPath(...names)
  }

  get files(): readonly VirtualFile[] {
    return this.fileList
  }

  get directories(): readonly VirtualDirectory[] {
    return this.directoryList
  }

  // ---------------------------------------------------------------------------
  // Files
  // ---------------------------------------------------------------------------

  /** Find a direct child file by bare name. */
  file(name: string): VirtualFile | undefined {
    return this.fileList.find((f) => f.name === name)
  }

  /** Find a direct child file by its full virtual path. */
  fileByPath(fullPath: string): VirtualFile | undefined {
    return this.fileList.find((f) => f.fullPath === fullPath)
  }

  containsFile(name: string): boolean {
    return this.file(name) !== undefined
  }

  /**
   * Append a file, or insert it at `position`.
   *
   * @throws EEXIST if a file with the same name is already present
   */
  addFile(file: VirtualFile, position: number = this.fileList.length): VirtualFile {
    if (this.containsFile(file.name)) {
      throw new EEXIST('addFile', joinPath(this.fullPath, file.name))
    }
    file.directory?.removeFile(file)
    this.fileList.splice(position, 0, file)
    file.attach(this)
    return file
  }

  /**
   * Detach a file. Returns false when the file is not a child of this
   * directory.
   */
  removeFile(file: VirtualFile): boolean {
    const position = this.fileList.indexOf(file)
    if (position === -1) {
      return false
    }
    this.fileList.splice(position, 1)
    file.attach(undefined)
    return true
  }

  // ---------------------------------------------------------------------------
  // Subdirectories
  // ---------------------------------------------------------------------------

  /** Find a direct subdirectory by exact (case-sensitive) name. */
  directory(name: string): VirtualDirectory | undefined {
    return this.directoryList.find((d) => d.name === name)
  }

  containsDirectory(name: string): boolean {
    return this.directory(name) !== undefined
  }

  /**
   * @throws EEXIST if a subdirectory with the same name is already present
   */
  addDirectory(directory: VirtualDirectory, position: number = this.directoryList.length): VirtualDirectory {
    if (this.containsDirectory(directory.name)) {
      throw new EEXIST('addDirectory', joinPath(this.fullPath, directory.name))
    }
    directory.parentRef?.removeDirectory(directory)
    this.directoryList.splice(position, 0, directory)
    directory.parentRef = this
    return directory
  }

  /**
   * Detach a subdirectory together with its subtree.
   */
  removeDirectory(directory: VirtualDirectory): boolean {
    const position = this.directoryList.indexOf(directory)
    if (position === -1) {
      return false
    }
    this.directoryList.splice(position, 1)
    directory.parentRef = undefined
    return true
  }
}

// =============================================================================
// VirtualTree
// =============================================================================

/**
 * Owner of a root directory and the index sequence of every directory in it.
 *
 * @example
 * ```typescript
 * const tree = new VirtualTree()
 * const docs = tree.createDirectory('docs', tree.root)
 * docs.addFile(new VirtualFile('readme.md', { kind: 'buffered', data }))
 * docs.fullPath          // 'docs'
 * docs.files[0].fullPath // 'docs\\readme.md'
 * ```
 */
export class VirtualTree {
  readonly root: VirtualDirectory
  private readonly sequence: IndexSequence

  constructor(sequence: IndexSequence = new IndexSequence()) {
    this.sequence = sequence
    this.root = new VirtualDirectory(ROOT_NAME, sequence.next())
  }

  /**
   * Create a subdirectory under `parent` with the next index.
   *
   * @throws EINVAL for an invalid name
   * @throws EEXIST if `parent` already has a subdirectory with that name
   */
  createDirectory(name: string, parent: VirtualDirectory): VirtualDirectory {
    validateName(name, 'createDirectory')
    if (parent.containsDirectory(name)) {
      throw new EEXIST('createDirectory', joinPath(parent.fullPath, name))
    }
    return parent.addDirectory(new VirtualDirectory(name, this.sequence.next()))
  }

  /**
   * Every directory of the tree in pre-order, the root first.
   */
  *directories(start: VirtualDirectory = this.root): Generator<VirtualDirectory> {
    yield start
    for (const child of start.directories) {
      yield* this.directories(child)
    }
  }

  /**
   * Every file of the tree, directory by directory in pre-order.
   */
  *files(start: VirtualDirectory = this.root): Generator<VirtualFile> {
    for (const directory of this.directories(start)) {
      yield* directory.files
    }
  }

  get fileCount(): number {
    let count = 0
    for (const _ of this.files()) count++
    return count
  }
}
