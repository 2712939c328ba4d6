/**
 * Archive backends and layers.
 *
 * @module archive
 */

export { PackedArchive } from './packed-archive.js'
export { LayeredArchive } from './layered-archive.js'
export { createArchive, type CreateArchiveOptions } from './factory.js'
export { ingest, ingestDirectory, ingestFile } from './ingest.js'
export type { IngestSource } from './ingest.js'
export {
  type ArchiveHeader,
  type HeaderDirectory,
  type HeaderFile,
  buildHeader,
  decodePreamble,
  encodeHeader,
  encodePreamble,
  parseHeader,
  treeFromHeader,
} from './header.js'
