import { ConfigurationError } from '../../core/errors.ts'
import type { TAuthProvider } from '../../core/types.ts'

/** Static bearer token auth. The same single header is attached on every hop. */
export class BearerAuthProvider implements TAuthProvider {
  readonly scheme = 'bearer' as const
  private readonly token: string

  constructor(token: string) {
    if (!token) throw new ConfigurationError('token must be a non-empty string')
    this.token = token
  }

  buildHeaders(): Record<string, string> {
    return { authorization: `Bearer ${this.token}` }
  }
}
