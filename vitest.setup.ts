import { beforeEach, afterEach, vi, type MockInstance } from 'vitest'

// Lets React's act() flush effects under jsdom without warnings
Object.assign(globalThis, { IS_REACT_ACT_ENVIRONMENT: true })

let errorSpy: MockInstance<typeof console.error> | null = null
const passthroughError = console.error.bind(console)

const SUPPRESSED_PREFIXES = [
  '[Extensions] Failed to',
  '[Actions] Action failed',
]

beforeEach(() => {
  errorSpy = vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    const first = String(args[0] ?? '')
    if (SUPPRESSED_PREFIXES.some((prefix) => first.startsWith(prefix))) {
      return
    }
    passthroughError(...args)
  })
})

afterEach(() => {
  errorSpy?.mockRestore()
  errorSpy = null
})
