import type { z } from 'zod'
import {
  resolveRoute,
  type TResolvedRoute,
  type TRouteContext,
  type TRouteName,
  type TRouteParams,
} from '../providers/endpoint/routes.ts'
import {
  HTTPError,
  InvalidCredentialError,
  MissingCredentialError,
  ResponseFormatError,
} from './errors.ts'
import type { Transport } from './transport.ts'
import type { TTransportRequest, TTransportResponse } from './types.ts'

export type TApiClientOptions = {
  transport: Transport
  /** Read on every call so organization or API root changes apply immediately. */
  context: () => TRouteContext
}

export type TApiRequestOptions = {
  /** Encoded as JSON. */
  json?: unknown
  body?: Uint8Array
  headers?: Record<string, string>
  /** Replaces the API root on routes that accept an execution target. */
  baseUrl?: string
  followRedirects?: boolean
  signal?: AbortSignal
  timeoutInMilliseconds?: number
}

export type TResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>

const encoder = new TextEncoder()

/**
 * Calls named routes over the session transport. Request bodies are encoded
 * here and 2xx bodies are validated against the schema the caller reads.
 */
export class ApiClient {
  private readonly transport: Transport
  private readonly context: () => TRouteContext

  constructor(options: TApiClientOptions) {
    this.transport = options.transport
    this.context = options.context
  }

  resolve(name: TRouteName, params: TRouteParams = {}, baseUrl?: string): TResolvedRoute {
    return resolveRoute(name, params, { ...this.context(), baseUrl })
  }

  /** Sends the route request; 401 and 403 surface as InvalidCredentialError. */
  async send(
    name: TRouteName,
    params: TRouteParams = {},
    options: TApiRequestOptions = {},
  ): Promise<TTransportResponse> {
    const route = this.resolve(name, params, options.baseUrl)
    if (route.requiresAuth && !this.transport.authScheme) throw new MissingCredentialError()

    const headers: Record<string, string> = { ...options.headers }
    let body = options.body
    if (options.json !== undefined) {
      body = encoder.encode(JSON.stringify(options.json))
      headers['content-type'] = 'application/json'
    }

    try {
      return await this.transport.call(
        { method: route.method, url: route.url, headers, body, authenticate: route.requiresAuth },
        {
          signal: options.signal,
          timeoutInMilliseconds: options.timeoutInMilliseconds,
          followRedirects: options.followRedirects,
        },
      )
    } catch (error) {
      if (error instanceof HTTPError && (error.status === 401 || error.status === 403)) {
        throw new InvalidCredentialError(
          `Not authorized (${error.status})${error.detail ? `: ${error.detail}` : ''}`,
          error.status,
        )
      }
      throw error
    }
  }

  /** Sends a request to a URL outside the route table, such as a presigned upload URL. */
  async sendToUrl(
    request: Omit<TTransportRequest, 'authenticate'>,
    options: Pick<TApiRequestOptions, 'signal' | 'timeoutInMilliseconds'> = {},
  ): Promise<TTransportResponse> {
    return await this.transport.call({ ...request, authenticate: false }, options)
  }

  async request<T>(
    schema: TResponseSchema<T>,
    name: TRouteName,
    params: TRouteParams = {},
    options: TApiRequestOptions = {},
  ): Promise<T> {
    const response = await this.send(name, params, options)
    return parseResponse(schema, name, response.json)
  }
}

export function parseResponse<T>(schema: TResponseSchema<T>, route: string, value: unknown): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new ResponseFormatError(route, `${where}${issue?.message ?? 'invalid body'}`)
  }
  return parsed.data
}
