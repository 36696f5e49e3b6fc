import { describe, expect, it } from 'vitest'
import { MissingCredentialError } from '../../../../src/core/errors.ts'
import { resolveCredentials } from '../../../../src/providers/auth/credentials.ts'

describe('resolveCredentials', () => {
  it('prefers flags over env over file', () => {
    const resolved = resolveCredentials({
      flags: { token: 'flag-token' },
      env: { token: 'env-token' },
      file: { token: 'file-token' },
    })
    expect(resolved).toEqual({ credential: { kind: 'bearer', token: 'flag-token' }, origin: 'flags' })
  })

  it('falls through sources without a complete credential', () => {
    const resolved = resolveCredentials({
      flags: { email: 'user@example.com' },
      env: {},
      file: { token: 'file-token' },
    })
    expect(resolved?.origin).toBe('file')
  })

  it('takes a signature credential whole from one source', () => {
    const resolved = resolveCredentials({
      env: { email: 'env@example.com' },
      file: { email: 'file@example.com', rsaKey: '~/.ssh/key.pem', token: 'file-token' },
    })
    expect(resolved).toEqual({
      credential: { kind: 'signature', keyId: 'file@example.com', privateKey: '~/.ssh/key.pem' },
      origin: 'file',
    })
  })

  it('does not combine a key from one source with an email from another', () => {
    const resolved = resolveCredentials({
      flags: { rsaKey: '/keys/id.pem' },
      env: { email: 'user@example.com', token: 'env-token' },
    })
    expect(resolved?.credential).toEqual({ kind: 'bearer', token: 'env-token' })
  })

  it('returns undefined when nothing is configured', () => {
    expect(resolveCredentials({ flags: {}, env: {}, file: {} })).toBeUndefined()
  })

  it('throws when a credential is required', () => {
    expect(() => resolveCredentials({}, { required: true })).toThrow(MissingCredentialError)
  })
})
