import type { TAuthProvider, TCredential } from '../../core/types.ts'
import { BearerAuthProvider } from './bearer-auth.ts'
import { SignedRequestAuthProvider } from './signed-request-auth.ts'

export function createAuthProvider(
  credential: TCredential,
  options?: { now?: () => Date },
): TAuthProvider {
  switch (credential.kind) {
    case 'bearer':
      return new BearerAuthProvider(credential.token)
    case 'signature':
      return new SignedRequestAuthProvider({
        keyId: credential.keyId,
        privateKey: credential.privateKey,
        now: options?.now,
      })
  }
}
