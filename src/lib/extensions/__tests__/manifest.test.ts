import { describe, it, expect } from 'vitest'
import {
  ManifestParseError,
  parseManifest,
  parseRemoteExtensions,
  validateManifest,
} from '../manifest'
import { gleam } from '@/test/fixtures'

describe('parseManifest', () => {
  it('accepts a minimal manifest and defaults authors', () => {
    expect(parseManifest({ id: 'my-ext', name: 'My Ext', version: '1.0.0' })).toEqual({
      id: 'my-ext',
      name: 'My Ext',
      version: '1.0.0',
      authors: [],
    })
  })

  it('rejects IDs with uppercase letters or spaces', () => {
    try {
      parseManifest({ id: 'My Ext', name: 'My Ext', version: '1.0.0' })
      expect.unreachable('parseManifest should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(ManifestParseError)
      if (err instanceof ManifestParseError) {
        expect(err.errors).toEqual([
          {
            path: 'id',
            message: 'Extension ID must use lowercase letters, numbers, hyphens and underscores',
          },
        ])
      }
    }
  })

  it('lists each missing field in the error message', () => {
    expect(() => parseManifest({})).toThrow(
      'Invalid extension data:\n  - id: Required\n  - name: Required\n  - version: Required'
    )
  })

  it('rejects a repository that is not a URL', () => {
    const result = validateManifest({ id: 'x', name: 'X', version: '1.0.0', repository: 'not a url' })
    expect(result.valid).toBe(false)
    expect(result.errors).toEqual([{ path: 'repository', message: 'Repository must be a valid URL' }])
  })
})

describe('validateManifest', () => {
  it('returns the parsed value when valid', () => {
    const result = validateManifest({ id: 'toml', name: 'TOML', version: '0.1.0-beta.1', authors: ['A'] })
    expect(result).toEqual({
      valid: true,
      value: { id: 'toml', name: 'TOML', version: '0.1.0-beta.1', authors: ['A'] },
    })
  })

  it('reports non-semver versions', () => {
    expect(validateManifest({ id: 'toml', name: 'TOML', version: 'latest' })).toEqual({
      valid: false,
      errors: [{ path: 'version', message: 'Version must be a valid semantic version (e.g., "1.2.3")' }],
    })
  })
})

describe('parseRemoteExtensions', () => {
  it('parses a list of registry entries', () => {
    expect(parseRemoteExtensions([gleam])).toEqual([gleam])
  })

  it('summarises the first three issues and counts the rest', () => {
    try {
      parseRemoteExtensions([{}])
      expect.unreachable('parseRemoteExtensions should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(ManifestParseError)
      if (err instanceof ManifestParseError) {
        expect(err.errors.map(e => e.path)).toEqual([
          '0.id',
          '0.name',
          '0.version',
          '0.authors',
          '0.repository',
          '0.downloadCount',
        ])
        expect(err.message).toBe(
          'Invalid extension data:\n' +
            '  - 0.id: Required\n' +
            '  - 0.name: Required\n' +
            '  - 0.version: Required\n' +
            '  ... and 3 more errors'
        )
      }
    }
  })
})
