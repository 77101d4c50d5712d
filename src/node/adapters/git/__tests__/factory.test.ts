import { log } from '@shared/logger'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { createGitAdapter, getGitAdapter, resetGitAdapter } from '../factory'
import { SimpleGitAdapter } from '../SimpleGitAdapter'

describe('git adapter factory', () => {
  afterEach(() => {
    resetGitAdapter()
    vi.restoreAllMocks()
  })

  it('announces the adapter only when verbose', () => {
    const info = vi.spyOn(log, 'info').mockImplementation(() => {})

    createGitAdapter()
    expect(info).not.toHaveBeenCalled()

    const adapter = createGitAdapter({ verbose: true })
    expect(adapter).toBeInstanceOf(SimpleGitAdapter)
    expect(info).toHaveBeenCalledTimes(1)
    expect(info).toHaveBeenCalledWith('[GitAdapter] Creating adapter: simple-git')
  })

  it('reuses the cached adapter and ignores later config', () => {
    const info = vi.spyOn(log, 'info').mockImplementation(() => {})

    const first = getGitAdapter()
    const second = getGitAdapter({ verbose: true })

    expect(second).toBe(first)
    expect(info).not.toHaveBeenCalled()
  })
})
