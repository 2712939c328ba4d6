/**
 * CLI Tests for arcfs
 *
 * Test coverage areas:
 * 1. Argument parsing (using cac)
 * 2. Output formatting (ls, search)
 * 3. Error handling (missing files, collisions, bad passwords)
 * 4. Help text (`arcfs --help`, `arcfs ls --help`)
 * 5. Version (`arcfs --version`)
 * 6. Exit codes (0 for success, 1 for error)
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { MemoryStorage } from '../core/backend.js'
import { createCLI, runCLI, type CLIContext } from './index.js'
import { formatLsOutput, normalizeCLIPath } from './utils/index.js'
import { VERSION } from './version.js'

const encode = (text: string) => new TextEncoder().encode(text)
const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes)

describe('arcfs CLI', () => {
  let storage: MemoryStorage
  let stdout: string[]
  let stderr: string[]
  let context: CLIContext

  const run = (...args: string[]) => runCLI(args, context)

  beforeEach(async () => {
    storage = new MemoryStorage()
    stdout = []
    stderr = []
    context = {
      storage,
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
    }

    await storage.mkdir('/input/docs')
    await storage.writeFile('/input/readme.md', encode('# readme'))
    await storage.writeFile('/input/docs/a.txt', encode('alpha'))
    await storage.writeFile('/input/docs/b.txt', encode('bravo'))
  })

  // ===========================================================================
  // Help & Version
  // ===========================================================================

  describe('help and version', () => {
    it('should register every command', () => {
      expect(createCLI().commands).toEqual(['create', 'ls', 'cat', 'add', 'rm', 'extract', 'search'])
    })

    it('should print the version', async () => {
      expect(await run('--version')).toEqual({ exitCode: 0 })
      expect(stdout).toEqual([VERSION])
    })

    it('should print the main help without arguments', async () => {
      expect((await run()).exitCode).toBe(0)
      expect(stdout[0]).toContain('$ arcfs <command> [options]')
    })

    it('should print command help', async () => {
      expect((await run('ls', '--help')).exitCode).toBe(0)
      expect(stdout[0]).toContain('$ arcfs ls <archive> [path]')
    })

    it('should reject unknown commands', async () => {
      expect(await run('frobnicate')).toEqual({ exitCode: 1, error: "unknown command 'frobnicate'" })
      expect(stderr).toEqual(["arcfs: unknown command 'frobnicate'"])
    })
  })

  // ===========================================================================
  // Commands
  // ===========================================================================

  describe('with an archive', () => {
    beforeEach(async () => {
      expect((await run('create', '/input', '/site.vfsa')).exitCode).toBe(0)
      expect(stdout).toEqual(['created /site.vfsa (3 files)'])
      stdout.length = 0
    })

    describe('ls', () => {
      it('should list the root with directories marked', async () => {
        await run('ls', '/site.vfsa')
        expect(stdout).toEqual(['readme.md\ndocs\\'])
      })

      it('should list recursively with paths from the root', async () => {
        await run('ls', '/site.vfsa', '-r')
        expect(stdout).toEqual(['readme.md\ndocs\\\ndocs\\a.txt\ndocs\\b.txt'])
      })

      it('should list a subdirectory in long format', async () => {
        await run('ls', '/site.vfsa', 'docs/', '--long')
        expect(stdout).toEqual([`- ${' '.repeat(9)}5 a.txt\n- ${' '.repeat(9)}5 b.txt`])
      })

      it('should fail for a missing directory', async () => {
        expect((await run('ls', '/site.vfsa', 'nope')).exitCode).toBe(1)
        expect(stderr).toEqual(["arcfs ls: no such directory 'nope'"])
      })
    })

    describe('cat', () => {
      it('should print a file addressed with either separator', async () => {
        await run('cat', '/site.vfsa', 'docs/a.txt')
        await run('cat', '/site.vfsa', 'docs\\b.txt')
        expect(stdout).toEqual(['alpha', 'bravo'])
      })

      it('should fail for a missing file', async () => {
        expect((await run('cat', '/site.vfsa', 'docs/zzz.txt')).exitCode).toBe(1)
        expect(stderr).toEqual(["arcfs cat: no such file 'docs/zzz.txt'"])
      })

      it('should fail for a missing archive', async () => {
        expect((await run('cat', '/none.vfsa', 'a.txt')).exitCode).toBe(1)
        expect(stderr).toEqual(["arcfs cat: ENOENT: no such file or directory, open '/none.vfsa'"])
      })

      it('should report a missing argument', async () => {
        expect(await run('cat', '/site.vfsa')).toEqual({ exitCode: 1, error: 'missing path argument' })
        expect(stderr).toEqual(['arcfs cat: missing path argument'])
      })
    })

    describe('add', () => {
      beforeEach(async () => {
        await storage.writeFile('/new.txt', encode('new!'))
      })

      it('should add a file and save', async () => {
        expect((await run('add', '/site.vfsa', '/new.txt', 'docs/new.txt')).exitCode).toBe(0)
        await run('cat', '/site.vfsa', 'docs/new.txt')
        expect(stdout).toEqual(['new!'])
      })

      it('should default to the base name in the root', async () => {
        await run('add', '/site.vfsa', '/new.txt')
        await run('cat', '/site.vfsa', 'new.txt')
        expect(stdout).toEqual(['new!'])
      })

      it('should refuse to replace without --force', async () => {
        expect((await run('add', '/site.vfsa', '/new.txt', 'docs/a.txt')).exitCode).toBe(1)
        expect(stderr).toEqual(["arcfs add: file exists 'docs\\a.txt' (use --force to replace it)"])

        expect((await run('add', '/site.vfsa', '/new.txt', 'docs/a.txt', '--force')).exitCode).toBe(0)
        await run('cat', '/site.vfsa', 'docs/a.txt')
        expect(stdout).toEqual(['new!'])
      })
    })

    describe('rm', () => {
      it('should remove a file', async () => {
        expect((await run('rm', '/site.vfsa', 'docs/a.txt')).exitCode).toBe(0)
        await run('ls', '/site.vfsa', 'docs')
        expect(stdout).toEqual(['b.txt'])
      })

      it('should remove a directory with --dir', async () => {
        expect((await run('rm', '/site.vfsa', 'docs', '--dir')).exitCode).toBe(0)
        await run('ls', '/site.vfsa')
        expect(stdout).toEqual(['readme.md'])
      })

      it('should fail for a missing entry', async () => {
        expect((await run('rm', '/site.vfsa', 'nope.txt')).exitCode).toBe(1)
        expect(stderr).toEqual(["arcfs rm: no such file 'nope.txt'"])
      })
    })

    describe('extract', () => {
      it('should extract everything', async () => {
        expect((await run('extract', '/site.vfsa', '/out')).exitCode).toBe(0)
        expect(decode(await storage.readFile('/out/readme.md'))).toBe('# readme')
        expect(decode(await storage.readFile('/out/docs/a.txt'))).toBe('alpha')
      })

      it('should extract a directory', async () => {
        await run('extract', '/site.vfsa', '/out', 'docs')
        expect(decode(await storage.readFile('/out/docs/b.txt'))).toBe('bravo')
      })

      it('should extract a single file', async () => {
        await run('extract', '/site.vfsa', '/out', 'docs/a.txt')
        expect(await storage.readdir('/out')).toEqual([{ name: 'a.txt', type: 'file' }])
      })

      it('should fail for a missing entry', async () => {
        expect((await run('extract', '/site.vfsa', '/out', 'nope')).exitCode).toBe(1)
        expect(stderr).toEqual(["arcfs extract: no such file or directory 'nope'"])
      })
    })

    describe('search', () => {
      it('should search the root files only by default', async () => {
        await run('search', '/site.vfsa', 'READ')
        expect(stdout).toEqual(['readme.md'])
      })

      it('should search recursively with -r', async () => {
        await run('search', '/site.vfsa', '.txt', '-r')
        expect(stdout).toEqual(['docs\\a.txt\ndocs\\b.txt'])
      })

      it('should list matching directories first', async () => {
        await run('search', '/site.vfsa', 'doc', '-r')
        expect(stdout).toEqual(['docs\\'])
      })

      it('should print nothing without matches', async () => {
        expect((await run('search', '/site.vfsa', 'zzz', '-r')).exitCode).toBe(0)
        expect(stdout).toEqual([])
      })
    })
  })

  // ===========================================================================
  // Layers
  // ===========================================================================

  describe('layer options', () => {
    it('should read a compressed archive with --gzip', async () => {
      await run('create', '/input', '/z.vfsa', '--gzip')
      await run('cat', '/z.vfsa', 'docs/a.txt', '--gzip')
      expect(stdout).toEqual(['created /z.vfsa (3 files)', 'alpha'])
    })

    it('should read an encrypted archive with the right password only', async () => {
      await run('create', '/input', '/e.vfsa', '--password', 'test-secret')
      await run('cat', '/e.vfsa', 'readme.md', '--password', 'test-secret')
      expect(stdout).toEqual(['created /e.vfsa (3 files)', '# readme'])

      expect((await run('cat', '/e.vfsa', 'readme.md', '--password', 'other-secret')).exitCode).toBe(1)
      expect(stderr).toEqual(["arcfs cat: EBADMSG: bad archive data, readFile 'readme.md'"])
    })
  })
})

describe('CLI utilities', () => {
  it('should normalize archive paths', () => {
    expect(normalizeCLIPath('/docs//a.txt')).toBe('docs\\a.txt')
    expect(normalizeCLIPath('docs\\a.txt')).toBe('docs\\a.txt')
    expect(normalizeCLIPath('docs/')).toBe('docs')
    expect(normalizeCLIPath('.')).toBe('')
  })

  it('should format ls entries', () => {
    const entries = [
      { name: 'a.txt', type: 'file' as const, size: 12 },
      { name: 'sub', type: 'directory' as const, size: 0 },
    ]
    expect(formatLsOutput(entries)).toBe('a.txt\nsub\\')
    expect(formatLsOutput(entries, { long: true })).toBe(`- ${' '.repeat(8)}12 a.txt\nd ${' '.repeat(9)}0 sub\\`)
  })
})
