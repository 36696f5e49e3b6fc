import type { ApiClient } from '../../core/api-client.ts'
import { AuthError } from '../../core/errors.ts'
import { SignInSchema, type TSignIn } from '../../types/api.ts'

export type TAuthApiOptions = {
  client: ApiClient
}

export type TSignInResult = {
  user: TSignIn
  /** Live token, or the test-mode token for accounts that only have one. */
  token: string
}

/**
 * Low-level client for the sign-in endpoint. The request carries no session
 * credentials; a rejected password surfaces as InvalidCredentialError.
 */
export class AuthApi {
  private readonly client: ApiClient

  constructor(options: TAuthApiOptions) {
    this.client = options.client
  }

  /** POST /users/sign_in with email and password. */
  async signIn(email: string, password: string, signal?: AbortSignal): Promise<TSignInResult> {
    const user = await this.client.request(SignInSchema, 'login', {}, {
      json: { user: { email, password } },
      signal,
    })

    const token = user.authentication_token || user.test_mode_authentication_token
    if (!token) throw new AuthError('Sign-in response did not include an authentication token')
    return { user, token }
  }
}
