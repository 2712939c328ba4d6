import { describe, it, expect, beforeEach } from 'vitest'
import { VirtualFile, VirtualTree } from './node.js'
import { directoryExists, fileExists, removeDirectory, removeFile, search } from './query.js'

const file = (name: string) => new VirtualFile(name, { kind: 'buffered', data: new Uint8Array(0) })

describe('query engine', () => {
  let tree: VirtualTree

  beforeEach(() => {
    tree = new VirtualTree()
  })

  // ===========================================================================
  // Exists
  // ===========================================================================

  describe('fileExists', () => {
    it('should be false for names that are not present', () => {
      tree.root.addFile(file('a.txt'))
      expect(fileExists('b.txt', tree.root)).toBe(false)
      expect(fileExists('', tree.root)).toBe(false)
    })

    it('should be true right after insertion and false right after removal', async () => {
      const sub = tree.createDirectory('sub', tree.root)
      sub.addFile(file('x.txt'))
      expect(fileExists('sub\\x.txt', tree.root)).toBe(true)

      const removed = await removeFile('sub\\x.txt', tree.root)
      expect(removed).toEqual({ success: true, value: true })
      expect(fileExists('sub\\x.txt', tree.root)).toBe(false)
    })

    it('should resolve multi-segment paths and fail at missing intermediates', () => {
      const sub = tree.createDirectory('sub', tree.root)
      sub.addFile(file('x.txt'))

      expect(fileExists('sub\\x.txt', tree.root)).toBe(true)
      expect(fileExists('sub\\y.txt', tree.root)).toBe(false)
      expect(fileExists('missing\\x.txt', tree.root)).toBe(false)
    })

    it('should not treat a directory as a file', () => {
      tree.createDirectory('docs', tree.root)
      expect(fileExists('docs', tree.root)).toBe(false)
    })
  })

  describe('directoryExists', () => {
    it('should find nested directories', () => {
      const docs = tree.createDirectory('docs', tree.root)
      tree.createDirectory('2024', docs)

      expect(directoryExists('docs', tree.root)).toBe(true)
      expect(directoryExists('docs\\2024', tree.root)).toBe(true)
      expect(directoryExists('2024', docs)).toBe(true)
      expect(directoryExists('docs\\2025', tree.root)).toBe(false)
    })

    it('should not treat an empty path or a file as a directory', () => {
      tree.root.addFile(file('a.txt'))
      expect(directoryExists('', tree.root)).toBe(false)
      expect(directoryExists('a.txt', tree.root)).toBe(false)
    })
  })

  // ===========================================================================
  // Remove
  // ===========================================================================

  describe('removeFile', () => {
    it('should succeed once and then report nothing found', async () => {
      tree.root.addFile(file('a.txt'))

      expect(await removeFile('a.txt', tree.root)).toEqual({ success: true, value: true })
      expect(await removeFile('a.txt', tree.root)).toEqual({ success: false, value: false })
    })

    it('should match single segments by bare name in the start directory', async () => {
      const sub = tree.createDirectory('sub', tree.root)
      const x = sub.addFile(file('x.txt'))

      expect((await removeFile('x.txt', tree.root)).success).toBe(false)
      expect((await removeFile('x.txt', sub)).success).toBe(true)
      expect(x.directory).toBeUndefined()
    })

    it('should report a missing intermediate directory as not found', async () => {
      const result = await removeFile('missing\\x.txt', tree.root)
      expect(result.success).toBe(false)
      expect(result.error).toBeUndefined()
    })

    it('should run off the caller stack', async () => {
      tree.root.addFile(file('a.txt'))
      const pending = removeFile('a.txt', tree.root)
      expect(fileExists('a.txt', tree.root)).toBe(true)
      await pending
      expect(fileExists('a.txt', tree.root)).toBe(false)
    })
  })

  describe('removeDirectory', () => {
    it('should detach the directory with its subtree', async () => {
      const docs = tree.createDirectory('docs', tree.root)
      tree.createDirectory('2024', docs).addFile(file('r.txt'))

      expect(await removeDirectory('docs', tree.root)).toEqual({ success: true, value: true })
      expect(directoryExists('docs', tree.root)).toBe(false)
      expect(tree.fileCount).toBe(0)
    })

    it('should remove nested directories by path', async () => {
      const docs = tree.createDirectory('docs', tree.root)
      tree.createDirectory('2024', docs)

      expect((await removeDirectory('docs\\2024', tree.root)).success).toBe(true)
      expect(directoryExists('docs', tree.root)).toBe(true)
      expect(directoryExists('docs\\2024', tree.root)).toBe(false)
    })

    it('should report missing directories as not found', async () => {
      expect(await removeDirectory('nope', tree.root)).toEqual({ success: false, value: false })
      expect(await removeDirectory('', tree.root)).toEqual({ success: false, value: false })
    })
  })

  // ===========================================================================
  // Search
  // ===========================================================================

  describe('search', () => {
    it('should match names ignoring case', () => {
      const report = tree.root.addFile(file('Report.TXT'))
      expect(search('report', tree.root, false).files).toEqual([report])
    })

    it('should never match directories in non-recursive mode', () => {
      tree.createDirectory('report', tree.root)
      const result = search('report', tree.root, false)
      expect(result.directories).toEqual([])
      expect(result.files).toEqual([])
    })

    it('should only check the start directory in non-recursive mode', () => {
      const sub = tree.createDirectory('sub', tree.root)
      sub.addFile(file('report.txt'))
      expect(search('report', tree.root, false).files).toEqual([])
    })

    it('should visit directories in pre-order and finish with the start files', () => {
      const top = tree.root.addFile(file('top.log'))
      const a = tree.createDirectory('a.log.d', tree.root)
      const a1 = a.addFile(file('a1.log'))
      const deep = tree.createDirectory('deep.log.d', a)
      const d1 = deep.addFile(file('d1.log'))
      const b = tree.createDirectory('b', tree.root)
      const b1 = b.addFile(file('b1.log'))

      const result = search('.log', tree.root, true)
      expect(result.directories).toEqual([a, deep])
      expect(result.files).toEqual([a1, d1, b1, top])
    })

    it('should return every file exactly once for a query matching all names', () => {
      tree.root.addFile(file('r1'))
      const x = tree.createDirectory('x', tree.root)
      x.addFile(file('x1'))
      x.addFile(file('x2'))
      tree.createDirectory('y', x).addFile(file('y1'))

      const result = search('', tree.root, true)
      expect(result.files.map((f) => f.fullPath).sort()).toEqual(['r1', 'x\\x1', 'x\\x2', 'x\\y\\y1'])
      expect(result.directories.map((d) => d.fullPath)).toEqual(['x', 'x\\y'])
    })

    it('should not mutate the tree', () => {
      tree.root.addFile(file('a'))
      search('a', tree.root, true)
      expect(tree.root.files.length).toBe(1)
    })
  })
})
