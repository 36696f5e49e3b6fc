export type THttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

export type TRetryPolicy = {
  attempts: number
  baseDelayInMilliseconds: number
  maximumDelayInMilliseconds: number
}

/** A single outgoing HTTP request. Built fresh per call and per redirect hop. */
export type TTransportRequest = {
  method: THttpMethod
  url: string
  headers?: Record<string, string>
  body?: Uint8Array
  /** Set to false to send the request without auth headers. @default true */
  authenticate?: boolean
}

export type TTransportResponse = {
  status: number
  headers: Headers
  bytes: Uint8Array
  text: string
  /** Parsed body when the response is JSON, otherwise undefined. */
  json: unknown
}

export type TCallOptions = {
  signal?: AbortSignal
  timeoutInMilliseconds?: number
  retryPolicy?: TRetryPolicy
  /** When false, 3xx responses are returned instead of followed. @default true */
  followRedirects?: boolean
}

/** What an auth provider sees of a request when computing its headers. */
export type TSignableRequest = {
  method: THttpMethod
  url: URL
  body?: Uint8Array
}

export type TAuthScheme = 'bearer' | 'signature'

export type TAuthProvider = {
  readonly scheme: TAuthScheme
  /** Returns the auth headers for this exact request; called again on every redirect hop. */
  buildHeaders(request: TSignableRequest): Record<string, string>
}

export type TCredential =
  | { kind: 'bearer'; token: string }
  | { kind: 'signature'; keyId: string; privateKey: string }
