import { MissingCredentialError } from '../../core/errors.ts'
import type { TCredential } from '../../core/types.ts'

export type TCredentialInput = {
  token?: string
  /** Key id for signed requests; the account email. */
  email?: string
  /** PEM private key, or a path to one. */
  rsaKey?: string
}

export type TCredentialSources = {
  flags?: TCredentialInput
  env?: TCredentialInput
  file?: TCredentialInput
}

export type TCredentialOrigin = 'flags' | 'env' | 'file'

export type TResolvedCredential = {
  credential: TCredential
  origin: TCredentialOrigin
}

const PRECEDENCE: readonly TCredentialOrigin[] = ['flags', 'env', 'file']

function fromInput(input: TCredentialInput | undefined): TCredential | undefined {
  if (!input) return undefined
  if (input.email && input.rsaKey) {
    return { kind: 'signature', keyId: input.email, privateKey: input.rsaKey }
  }
  if (input.token) return { kind: 'bearer', token: input.token }
  return undefined
}

/**
 * Picks the credential from the highest-precedence source that carries a
 * complete one (flags, then env, then file). A credential is taken whole from
 * a single source so two auth schemes are never mixed.
 */
export function resolveCredentials(
  sources: TCredentialSources,
  options: { required: true },
): TResolvedCredential
export function resolveCredentials(
  sources: TCredentialSources,
  options?: { required?: boolean },
): TResolvedCredential | undefined
export function resolveCredentials(
  sources: TCredentialSources,
  options?: { required?: boolean },
): TResolvedCredential | undefined {
  for (const origin of PRECEDENCE) {
    const credential = fromInput(sources[origin])
    if (credential) return { credential, origin }
  }
  if (options?.required) throw new MissingCredentialError()
  return undefined
}
