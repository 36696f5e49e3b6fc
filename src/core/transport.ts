import { CookieJar } from './cookies.ts'
import {
  AbortOperationError,
  ConfigurationError,
  ConnectionFailedError,
  HTTPError,
  InvalidCredentialError,
  RedirectLimitError,
  TimeoutError,
} from './errors.ts'
import { logger } from './logger.ts'
import {
  calculateBackoff,
  DEFAULT_RETRY_POLICY,
  IDEMPOTENT_METHODS,
  RETRYABLE_STATUSES,
  sleep,
} from './retry.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  TAuthProvider,
  TCallOptions,
  THttpMethod,
  TRetryPolicy,
  TTransportRequest,
  TTransportResponse,
} from './types.ts'
import {
  createTimeoutSignal,
  extractErrorDetail,
  isSameHost,
  normalizeBaseUrl,
  resolveFetch,
} from './utils.ts'

const DEFAULT_TIMEOUT_IN_MILLISECONDS = 30_000
const DEFAULT_MAXIMUM_REDIRECTS = 10
const ORGANIZATION_HEADER = 'organization'
const BODY_METHODS: ReadonlySet<THttpMethod> = new Set(['PUT', 'POST', 'PATCH'])
const decoder = new TextDecoder()
const REDIRECT_STATUSES: ReadonlySet<number> = new Set([301, 302, 303, 307, 308])

export type TTransportOptions = {
  /** API root; auth, organization and cookie headers are only sent to this host. */
  apiRoot: string
  authProvider?: TAuthProvider
  organizationId?: string
  retryPolicy?: TRetryPolicy
  timeoutInMilliseconds?: number
  maximumRedirects?: number
  cookieJar?: CookieJar
  fetchImplementation?: typeof fetch
}

/**
 * Performs HTTP exchanges for a session: attaches session headers, follows
 * redirects by rebuilding the request (auth included) for each hop, and
 * retries connection failures and gateway errors a bounded number of times.
 */
export class Transport {
  private apiRoot: string
  private authProvider?: TAuthProvider
  private organizationId?: string
  private readonly retryPolicy: TRetryPolicy
  private readonly timeoutInMilliseconds: number
  private readonly maximumRedirects: number
  private readonly fetchImplementation: typeof fetch
  readonly cookieJar: CookieJar

  constructor(options: TTransportOptions) {
    this.apiRoot = normalizeBaseUrl(options.apiRoot)
    this.authProvider = options.authProvider
    this.organizationId = options.organizationId
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.maximumRedirects = options.maximumRedirects ?? DEFAULT_MAXIMUM_REDIRECTS
    this.cookieJar = options.cookieJar ?? new CookieJar()
    this.fetchImplementation = resolveFetch(options.fetchImplementation)

    if (this.retryPolicy.attempts < 1) {
      throw new ConfigurationError('retryPolicy.attempts must be at least 1')
    }
  }

  setApiRoot(apiRoot: string): void {
    this.apiRoot = normalizeBaseUrl(apiRoot)
  }

  setAuthProvider(authProvider: TAuthProvider | undefined): void {
    this.authProvider = authProvider
  }

  setOrganizationId(organizationId: string | undefined): void {
    this.organizationId = organizationId
  }

  get authScheme(): TAuthProvider['scheme'] | undefined {
    return this.authProvider?.scheme
  }

  /** Sends the request and returns a 2xx (or unfollowed 3xx) response; anything else throws. */
  async call(request: TTransportRequest, options: TCallOptions = {}): Promise<TTransportResponse> {
    const retryPolicy = options.retryPolicy ?? this.retryPolicy
    const lastAttemptIndex = retryPolicy.attempts - 1

    for (let attemptIndex = 0; ; attemptIndex++) {
      if (options.signal?.aborted) throw new AbortOperationError()

      let response: TTransportResponse
      try {
        response = await this.exchange(request, options)
      } catch (caughtError) {
        if (caughtError instanceof ConnectionFailedError && attemptIndex < lastAttemptIndex) {
          logger.debug(`${caughtError.message}; retrying (${attemptIndex + 1}/${lastAttemptIndex})`)
          await this.backoff(attemptIndex, retryPolicy, options.signal)
          continue
        }
        throw caughtError
      }

      if (
        RETRYABLE_STATUSES.has(response.status) &&
        IDEMPOTENT_METHODS.has(request.method) &&
        attemptIndex < lastAttemptIndex
      ) {
        logger.debug(`HTTP ${response.status} from ${request.url}; retrying`)
        await this.backoff(attemptIndex, retryPolicy, options.signal)
        continue
      }

      if (response.status >= 400) {
        const detail = extractErrorDetail(response.text, response.json)
        throw new HTTPError(
          response.status,
          response.text,
          `HTTP ${response.status} for ${request.method} ${request.url}${detail ? `: ${detail}` : ''}`,
          detail,
        )
      }
      return response
    }
  }

  private async backoff(
    attemptIndex: number,
    retryPolicy: TRetryPolicy,
    signal?: AbortSignal,
  ): Promise<void> {
    await sleep(
      calculateBackoff(
        attemptIndex,
        retryPolicy.baseDelayInMilliseconds,
        retryPolicy.maximumDelayInMilliseconds,
      ),
      signal,
    )
  }

  private async exchange(
    request: TTransportRequest,
    options: TCallOptions,
  ): Promise<TTransportResponse> {
    let current: TTransportRequest = request

    for (let hop = 0; ; hop++) {
      const response = await this.send(current, options)
      const location = response.headers.get('location')

      if (
        !REDIRECT_STATUSES.has(response.status) ||
        !location ||
        options.followRedirects === false
      ) {
        return response
      }
      if (hop >= this.maximumRedirects) {
        throw new RedirectLimitError(this.maximumRedirects, request.url)
      }

      current = rebuildForRedirect(current, response.status, new URL(location, current.url))
      logger.debug(`Following ${response.status} to ${current.url}`)
    }
  }

  /** One HTTP exchange. Headers, including auth, are computed here for this exact request. */
  private async send(
    request: TTransportRequest,
    options: TCallOptions,
  ): Promise<TTransportResponse> {
    const url = new URL(request.url)
    const isApiRequest = isSameHost(url, this.apiRoot)
    const body = BODY_METHODS.has(request.method)
      ? (request.body ?? new Uint8Array(0))
      : request.body

    const headers: Record<string, string> = {
      'user-agent': USER_AGENT,
      accept: 'application/json',
      ...lowercaseKeys(request.headers),
    }

    if (isApiRequest) {
      if (this.organizationId) headers[ORGANIZATION_HEADER] = this.organizationId
      const cookie = this.cookieJar.toHeader()
      if (cookie) headers.cookie = cookie
      if (this.authProvider && request.authenticate !== false) {
        delete headers.authorization
        Object.assign(headers, this.authProvider.buildHeaders({ method: request.method, url, body }))
      }
    }

    assertSendableHeaders(headers)
    logger.debug(`${request.method}: ${url.toString()}`)

    const timeoutInMilliseconds = options.timeoutInMilliseconds ?? this.timeoutInMilliseconds
    const { signal, timeoutSignal, cleanup } = createTimeoutSignal(
      timeoutInMilliseconds,
      options.signal,
    )

    try {
      const httpResponse = await this.fetchImplementation(url, {
        method: request.method,
        headers,
        body,
        redirect: 'manual',
        signal,
      })
      if (isApiRequest) this.cookieJar.storeFromResponse(httpResponse.headers)

      const bytes = new Uint8Array(await httpResponse.arrayBuffer())
      const text = decoder.decode(bytes)
      return {
        status: httpResponse.status,
        headers: httpResponse.headers,
        bytes,
        text,
        json: parseJsonBody(httpResponse.headers, text),
      }
    } catch (caughtError) {
      if (options.signal?.aborted) throw new AbortOperationError()
      if (timeoutSignal.aborted) {
        throw new TimeoutError(
          `${request.method} ${request.url} timed out after ${timeoutInMilliseconds}ms`,
        )
      }
      const reason = caughtError instanceof Error ? caughtError.message : String(caughtError)
      throw new ConnectionFailedError(
        `Could not reach ${url.host} (${request.method} ${request.url}): ${reason}`,
        caughtError,
      )
    } finally {
      cleanup()
    }
  }
}

/** Redirects that switch to GET drop the body and its content headers, like browsers do. */
function rebuildForRedirect(
  request: TTransportRequest,
  status: number,
  location: URL,
): TTransportRequest {
  const switchesToGet =
    status === 303 ||
    ((status === 301 || status === 302) && request.method !== 'GET' && request.method !== 'HEAD')

  if (!switchesToGet) return { ...request, url: location.toString() }

  const headers = lowercaseKeys(request.headers)
  delete headers['content-type']
  return {
    method: request.method === 'HEAD' ? 'HEAD' : 'GET',
    url: location.toString(),
    headers,
    authenticate: request.authenticate,
  }
}

/** Header values fetch would refuse, such as non-Latin-1 text, fail here rather than as a network error. */
function assertSendableHeaders(headers: Record<string, string>): void {
  for (const [name, value] of Object.entries(headers)) {
    try {
      new Headers({ [name]: value })
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      if (name === 'authorization') {
        throw new InvalidCredentialError(`The credential cannot be sent as a header: ${reason}`)
      }
      throw new ConfigurationError(`Invalid value for header '${name}': ${reason}`)
    }
  }
}

function lowercaseKeys(headers: Record<string, string> | undefined): Record<string, string> {
  const result: Record<string, string> = {}
  for (const [key, value] of Object.entries(headers ?? {})) result[key.toLowerCase()] = value
  return result
}

function parseJsonBody(headers: Headers, text: string): unknown {
  if (!text) return undefined
  const contentType = headers.get('content-type') ?? ''
  const looksLikeJson = /^\s*[[{]/.test(text)
  if (!contentType.includes('json') && !looksLikeJson) return undefined
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}
