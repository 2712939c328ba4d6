import { describe, it, expect, vi } from 'vitest'
import { createConfig, defaultConfig, withArchivePath } from './config.js'
import { MAX_CONTENT_SIZE } from './constants.js'

describe('createConfig', () => {
  it('should use defaults for missing options', () => {
    const config = createConfig()
    expect(config).toEqual(defaultConfig)
    expect(config.maxContentSize).toBe(MAX_CONTENT_SIZE)
    expect(config.saveAfterChange).toBe(false)
    expect(config.archivePath).toBeUndefined()
  })

  it('should freeze the result', () => {
    const config = createConfig({ archivePath: 'site.vfsa' })
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('should keep valid options', () => {
    const config = createConfig({ archivePath: 'site.vfsa', saveAfterChange: true, maxContentSize: 1024 })
    expect(config.archivePath).toBe('site.vfsa')
    expect(config.saveAfterChange).toBe(true)
    expect(config.maxContentSize).toBe(1024)
  })

  it('should reject an empty archive path', () => {
    expect(() => createConfig({ archivePath: '  ' })).toThrow('EINVAL')
  })

  it('should reject sizes outside 0..1 GiB', () => {
    expect(() => createConfig({ maxContentSize: -1 })).toThrow('EINVAL')
    expect(() => createConfig({ maxContentSize: MAX_CONTENT_SIZE + 1 })).toThrow('EINVAL')
    expect(() => createConfig({ maxContentSize: 1.5 })).toThrow('EINVAL')
  })

  it('should forward progress events to the listener', () => {
    const listener = vi.fn()
    const config = createConfig({ onProgress: listener })
    config.onProgress?.({ operation: 'save', processed: 1, total: 2, path: 'a.txt', elapsed: 0 })
    expect(listener).toHaveBeenCalledWith({ operation: 'save', processed: 1, total: 2, path: 'a.txt', elapsed: 0 })
  })
})

describe('withArchivePath', () => {
  it('should copy the config with a new path', () => {
    const config = createConfig({ saveAfterChange: true })
    const moved = withArchivePath(config, 'moved.vfsa')

    expect(moved.archivePath).toBe('moved.vfsa')
    expect(moved.saveAfterChange).toBe(true)
    expect(config.archivePath).toBeUndefined()
    expect(Object.isFrozen(moved)).toBe(true)
  })
})
