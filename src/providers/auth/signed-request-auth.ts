import { createHash, createPrivateKey, createSign, type KeyObject } from 'crypto'
import { ConfigurationError, InvalidCredentialError } from '../../core/errors.ts'
import type { TAuthProvider, TSignableRequest } from '../../core/types.ts'

const BASE_HEADERS = ['(request-target)', 'date', 'host'] as const
const BODY_HEADERS = ['digest', 'content-length'] as const
const BODY_METHODS: ReadonlySet<string> = new Set(['PUT', 'POST', 'PATCH'])

export type TSignedRequestAuthOptions = {
  /** Key id sent with each signature; the account email. */
  keyId: string
  /** RSA private key in PEM format. */
  privateKey: string
  /** Clock used for the `date` header. */
  now?: () => Date
}

/**
 * HTTP Signatures (rsa-sha256) over `(request-target) date host`, plus
 * `digest content-length` for PUT/POST/PATCH. A missing body is signed as an
 * empty payload. Headers are derived from the request passed in, so each
 * redirect hop gets a signature for its own target.
 */
export class SignedRequestAuthProvider implements TAuthProvider {
  readonly scheme = 'signature' as const
  private readonly keyId: string
  private readonly key: KeyObject
  private readonly now: () => Date

  constructor(options: TSignedRequestAuthOptions) {
    if (!options.keyId) throw new ConfigurationError('keyId must be a non-empty string')
    this.keyId = options.keyId
    this.now = options.now ?? (() => new Date())

    try {
      this.key = createPrivateKey(options.privateKey)
    } catch {
      throw new InvalidCredentialError(
        'Could not parse the specified RSA key, ensure it is a PRIVATE key in PEM format',
      )
    }
    if (this.key.asymmetricKeyType !== 'rsa') {
      throw new InvalidCredentialError('Signing key must be an RSA private key')
    }
  }

  buildHeaders(request: TSignableRequest): Record<string, string> {
    const host = request.url.host
    const headers: Record<string, string> = { date: this.now().toUTCString() }
    const signedHeaderNames: string[] = [...BASE_HEADERS]

    if (BODY_METHODS.has(request.method)) {
      const body = request.body ?? new Uint8Array(0)
      headers.digest = `SHA-256=${createHash('sha256').update(body).digest('base64')}`
      headers['content-length'] = String(body.byteLength)
      signedHeaderNames.push(...BODY_HEADERS)
    }

    const target = `${request.method.toLowerCase()} ${request.url.pathname}${request.url.search}`
    const signingString = signedHeaderNames
      .map((name) => {
        if (name === '(request-target)') return `${name}: ${target}`
        if (name === 'host') return `${name}: ${host}`
        return `${name}: ${headers[name]}`
      })
      .join('\n')

    const signature = createSign('RSA-SHA256').update(signingString).sign(this.key, 'base64')

    // fetch derives the host header from the URL
    return {
      ...headers,
      authorization:
        `Signature keyId="${this.keyId}",algorithm="rsa-sha256",` +
        `headers="${signedHeaderNames.join(' ')}",signature="${signature}"`,
    }
  }
}
