/**
 * Tests for MemoryStorage
 *
 * Covers the ArchiveStorage interface, error conditions and path handling.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryStorage } from './backend.js'

const encode = (text: string) => new TextEncoder().encode(text)
const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes)

describe('MemoryStorage', () => {
  let storage: MemoryStorage

  beforeEach(() => {
    storage = new MemoryStorage()
  })

  // ===========================================================================
  // File Operations
  // ===========================================================================

  describe('readFile', () => {
    it('should read a file that was written', async () => {
      await storage.writeFile('/test.txt', encode('Hello, World!'))

      const result = await storage.readFile('/test.txt')
      expect(result).toBeInstanceOf(Uint8Array)
      expect(decode(result)).toBe('Hello, World!')
    })

    it('should return a copy of the stored bytes', async () => {
      await storage.writeFile('/a.bin', new Uint8Array([1, 2, 3]))

      const first = await storage.readFile('/a.bin')
      first[0] = 9
      expect(await storage.readFile('/a.bin')).toEqual(new Uint8Array([1, 2, 3]))
    })

    it('should throw ENOENT when file does not exist', async () => {
      await expect(storage.readFile('/nonexistent.txt')).rejects.toThrow('ENOENT')
    })

    it('should throw EISDIR when path is a directory', async () => {
      await storage.mkdir('/mydir')
      await expect(storage.readFile('/mydir')).rejects.toThrow('EISDIR')
    })
  })

  describe('readRange', () => {
    beforeEach(async () => {
      await storage.writeFile('/data.bin', new Uint8Array([0, 1, 2, 3, 4, 5, 6, 7]))
    })

    it('should read the requested range', async () => {
      expect(await storage.readRange('/data.bin', 2, 3)).toEqual(new Uint8Array([2, 3, 4]))
    })

    it('should return fewer bytes at the end of the file', async () => {
      expect(await storage.readRange('/data.bin', 6, 10)).toEqual(new Uint8Array([6, 7]))
    })
  })

  describe('writeFile', () => {
    it('should replace existing content', async () => {
      await storage.writeFile('/file.txt', encode('old'))
      await storage.writeFile('/file.txt', encode('new'))
      expect(decode(await storage.readFile('/file.txt'))).toBe('new')
    })

    it('should throw ENOENT when the parent directory is missing', async () => {
      await expect(storage.writeFile('/missing/file.txt', encode('x'))).rejects.toThrow('ENOENT')
    })

    it('should throw ENOTDIR when the parent is a file', async () => {
      await storage.writeFile('/file.txt', encode('x'))
      await expect(storage.writeFile('/file.txt/child', encode('y'))).rejects.toThrow('ENOTDIR')
    })
  })

  // ===========================================================================
  // Directory Operations
  // ===========================================================================

  describe('mkdir', () => {
    it('should create missing parents', async () => {
      await storage.mkdir('/a/b/c')
      expect(await storage.stat('/a')).toEqual({ type: 'directory', size: 0 })
      expect(await storage.stat('/a/b/c')).toEqual({ type: 'directory', size: 0 })
    })

    it('should accept an existing directory', async () => {
      await storage.mkdir('/a')
      await expect(storage.mkdir('/a')).resolves.toBeUndefined()
    })

    it('should throw EEXIST when a file is in the way', async () => {
      await storage.writeFile('/a', encode('x'))
      await expect(storage.mkdir('/a/b')).rejects.toThrow('EEXIST')
    })
  })

  describe('readdir', () => {
    it('should list direct children sorted by name', async () => {
      await storage.mkdir('/dir/sub/deeper')
      await storage.writeFile('/dir/b.txt', encode('b'))
      await storage.writeFile('/dir/a.txt', encode('a'))
      await storage.writeFile('/dir/sub/c.txt', encode('c'))

      expect(await storage.readdir('/dir')).toEqual([
        { name: 'a.txt', type: 'file' },
        { name: 'b.txt', type: 'file' },
        { name: 'sub', type: 'directory' },
      ])
    })

    it('should throw ENOENT for a missing directory', async () => {
      await expect(storage.readdir('/missing')).rejects.toThrow('ENOENT')
    })

    it('should throw ENOTDIR for a file', async () => {
      await storage.writeFile('/file.txt', encode('x'))
      await expect(storage.readdir('/file.txt')).rejects.toThrow('ENOTDIR')
    })
  })

  // ===========================================================================
  // Metadata & Paths
  // ===========================================================================

  describe('stat and exists', () => {
    it('should report file sizes', async () => {
      await storage.writeFile('/five.txt', encode('12345'))
      expect(await storage.stat('/five.txt')).toEqual({ type: 'file', size: 5 })
    })

    it('should throw ENOENT from stat for missing paths', async () => {
      await expect(storage.stat('/nope')).rejects.toThrow('ENOENT')
    })

    it('should tell whether a path exists', async () => {
      await storage.writeFile('/x', encode('x'))
      expect(await storage.exists('/x')).toBe(true)
      expect(await storage.exists('/')).toBe(true)
      expect(await storage.exists('/y')).toBe(false)
    })
  })

  describe('path handling', () => {
    it('should normalize duplicate slashes and dot segments', async () => {
      await storage.mkdir('/a/b')
      await storage.writeFile('//a/./b/../b/f.txt', encode('f'))
      expect(decode(await storage.readFile('/a/b/f.txt'))).toBe('f')
    })

    it('should join segments into absolute paths', () => {
      expect(storage.join('/out', 'docs', 'a.txt')).toBe('/out/docs/a.txt')
      expect(storage.join('out', '', 'a.txt')).toBe('/out/a.txt')
    })

    it('should return the last segment as basename', () => {
      expect(storage.basename('/input/docs/')).toBe('docs')
      expect(storage.basename('/input/a.txt')).toBe('a.txt')
    })

    it('should reject an empty path', async () => {
      await expect(storage.readFile('')).rejects.toThrow('EINVAL')
    })
  })
})
