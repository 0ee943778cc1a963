import { describe, it, expect, vi, afterEach } from 'vitest'
import { executeAction, getRegisteredActions, isActionRegistered, registerAction } from '../registry'

const cleanups: Array<() => void> = []

afterEach(() => {
  cleanups.splice(0).forEach(unregister => unregister())
  vi.restoreAllMocks()
})

function register(id: string, handler: () => void | Promise<void>) {
  cleanups.push(registerAction({ id, description: `Test action ${id}` }, handler))
}

describe('action registry', () => {
  it('runs a registered handler', async () => {
    const handler = vi.fn()
    register('test-run', handler)

    await expect(executeAction('test-run')).resolves.toBe(true)
    expect(handler).toHaveBeenCalledTimes(1)
  })

  it('lists actions in registration order', () => {
    register('test-first', () => {})
    register('test-second', () => {})

    expect(getRegisteredActions()).toEqual([
      { id: 'test-first', description: 'Test action test-first' },
      { id: 'test-second', description: 'Test action test-second' },
    ])
  })

  it('resolves false for unknown actions', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    await expect(executeAction('test-missing')).resolves.toBe(false)
    expect(warn).toHaveBeenCalledWith('[Actions] Unknown action', { id: 'test-missing' })
  })

  it('logs handler failures instead of throwing', async () => {
    register('test-fail', async () => {
      throw new Error('no workspace')
    })

    await expect(executeAction('test-fail')).resolves.toBe(false)
    expect(console.error).toHaveBeenCalledWith('[Actions] Action failed', {
      id: 'test-fail',
      error: 'no workspace',
    })
  })

  it('unregisters only its own handler', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const unregisterOld = registerAction({ id: 'test-shared', description: 'old' }, () => {})
    register('test-shared', () => {})

    unregisterOld()

    expect(isActionRegistered('test-shared')).toBe(true)
  })
})
