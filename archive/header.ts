/**
 * Packed archive header codec.
 *
 * Layout of a packed archive file:
 *
 * ```
 * [magic "VFSA":4][version:u32le][headerLength:u32le][header: UTF-8 JSON][data region]
 * ```
 *
 * The header describes the whole tree. File offsets are relative to the
 * start of the data region, so the header can be written before the
 * offsets of the data region are known to the reader.
 *
 * @module archive/header
 */

import { ARCHIVE_MAGIC, FORMAT_VERSION, PREAMBLE_SIZE } from '../core/constants.js'
import { EBADMSG } from '../core/errors.js'
import { VirtualFile, VirtualTree, type VirtualDirectory } from '../core/node.js'
import { isValidName } from '../core/path.js'

// =============================================================================
// Header Types
// =============================================================================

export interface HeaderFile {
  name: string
  /** Offset relative to the data region */
  offset: number
  size: number
}

export interface HeaderDirectory {
  name: string
  directories: HeaderDirectory[]
  files: HeaderFile[]
}

export interface ArchiveHeader {
  version: number
  root: HeaderDirectory
}

// =============================================================================
// Preamble
// =============================================================================

export function encodePreamble(headerLength: number): Uint8Array {
  const preamble = new Uint8Array(PREAMBLE_SIZE)
  preamble.set(ARCHIVE_MAGIC, 0)
  const view = new DataView(preamble.buffer)
  view.setUint32(4, FORMAT_VERSION, true)
  view.setUint32(8, headerLength, true)
  return preamble
}

/**
 * Validate the preamble and return the header length.
 *
 * @throws EBADMSG on a wrong magic number, unsupported version or truncated input
 */
export function decodePreamble(bytes: Uint8Array, archivePath: string): number {
  if (bytes.length < PREAMBLE_SIZE) {
    throw new EBADMSG('read', archivePath)
  }
  for (let i = 0; i < ARCHIVE_MAGIC.length; i++) {
    if (bytes[i] !== ARCHIVE_MAGIC[i]) {
      throw new EBADMSG('read', archivePath)
    }
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  if (view.getUint32(4, true) !== FORMAT_VERSION) {
    throw new EBADMSG('read', archivePath)
  }
  return view.getUint32(8, true)
}

// =============================================================================
// Header
// =============================================================================

/**
 * Describe `tree` with the given data-region offsets.
 */
export function buildHeader(tree: VirtualTree, offsets: ReadonlyMap<VirtualFile, number>): ArchiveHeader {
  const describe = (directory: VirtualDirectory): HeaderDirectory => ({
    name: directory.name,
    directories: directory.directories.map(describe),
    files: directory.files.map((file) => ({
      name: file.name,
      offset: offsets.get(file) ?? 0,
      size: file.size,
    })),
  })
  return { version: FORMAT_VERSION, root: describe(tree.root) }
}

export function encodeHeader(header: ArchiveHeader): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(header))
}

/**
 * Parse and validate header bytes.
 *
 * @throws EBADMSG if the header is not valid JSON or not a valid tree
 */
export function parseHeader(bytes: Uint8Array, archivePath: string): ArchiveHeader {
  let value: unknown
  try {
    value = JSON.parse(new TextDecoder().decode(bytes))
  } catch (err) {
    throw new EBADMSG('read', archivePath, { cause: err })
  }

  if (!isRecord(value) || value.version !== FORMAT_VERSION || !isHeaderDirectory(value.root, true)) {
    throw new EBADMSG('read', archivePath)
  }
  return { version: FORMAT_VERSION, root: value.root }
}

/**
 * Rebuild a tree from a header. File handles become `stored` with offsets
 * absolute within the archive file.
 *
 * @throws EBADMSG on duplicate names
 */
export function treeFromHeader(header: ArchiveHeader, dataStart: number, archivePath: string): VirtualTree {
  const tree = new VirtualTree()

  const populate = (source: HeaderDirectory, target: VirtualDirectory): void => {
    for (const file of source.files) {
      if (target.containsFile(file.name)) {
        throw new EBADMSG('read', archivePath)
      }
      target.addFile(new VirtualFile(file.name, { kind: 'stored', offset: dataStart + file.offset, size: file.size }))
    }
    for (const child of source.directories) {
      if (target.containsDirectory(child.name)) {
        throw new EBADMSG('read', archivePath)
      }
      populate(child, tree.createDirectory(child.name, target))
    }
  }

  populate(header.root, tree.root)
  return tree
}

// =============================================================================
// Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0
}

function isHeaderFile(value: unknown): value is HeaderFile {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    isValidName(value.name) &&
    isNonNegativeInteger(value.offset) &&
    isNonNegativeInteger(value.size)
  )
}

function isHeaderDirectory(value: unknown, isRoot: boolean = false): value is HeaderDirectory {
  if (!isRecord(value) || typeof value.name !== 'string') {
    return false
  }
  if (isRoot ? value.name !== '' : !isValidName(value.name)) {
    return false
  }
  return (
    Array.isArray(value.files) &&
    value.files.every((file) => isHeaderFile(file)) &&
    Array.isArray(value.directories) &&
    value.directories.every((child) => isHeaderDirectory(child))
  )
}
