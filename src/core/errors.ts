/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Indicates an entity could not be found. */
export class NotFoundError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/** Indicates an operation was aborted via AbortSignal. */
export class AbortOperationError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}

/** Raised when a project name matches more than one project; the caller must pass an id. */
export class AmbiguousProjectError extends Error {
  readonly candidateIds: string[]

  constructor(name: string, candidateIds: string[]) {
    super(`Found multiple projects matching '${name}': ${candidateIds.join(', ')}. Use a project id.`)
    this.name = 'AmbiguousProjectError'
    this.candidateIds = candidateIds
  }
}

/** The remote service rejected a protocol during analysis or submission. */
export class AnalysisError extends Error {
  readonly messages: string[]

  constructor(messages: string[], prefix = 'in protocol') {
    const plural = messages.length > 1 ? 's' : ''
    super(`Error${plural} ${prefix}:\n${messages.map((m) => `- ${m}`).join('\n')}`)
    this.name = 'AnalysisError'
    this.messages = messages
  }
}

// ── Auth ──────────────────────────────────────────────────────────────────────

/** Indicates an authentication or authorization failure. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AuthError'
  }
}

export class MissingCredentialError extends AuthError {
  constructor(message = 'No credentials found. Run `transcriptic login` or set TRANSCRIPTIC_TOKEN.') {
    super(message)
    this.name = 'MissingCredentialError'
  }
}

export class InvalidCredentialError extends AuthError {
  readonly status?: number

  constructor(message: string, status?: number) {
    super(message)
    this.name = 'InvalidCredentialError'
    this.status = status
  }
}

// ── Routes ────────────────────────────────────────────────────────────────────

export class RouteError extends Error {
  readonly route: string

  constructor(route: string, message: string) {
    super(message)
    this.name = 'RouteError'
    this.route = route
  }
}

export class UnknownRouteError extends RouteError {
  constructor(route: string) {
    super(route, `Unknown route: ${route}`)
    this.name = 'UnknownRouteError'
  }
}

export class MissingParamError extends RouteError {
  readonly param: string

  constructor(route: string, param: string) {
    super(route, `For route: ${route}, argument ${param} needs to be provided.`)
    this.name = 'MissingParamError'
    this.param = param
  }
}

// ── Transport ─────────────────────────────────────────────────────────────────

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/** The request never produced a response (DNS, refused connection, reset socket). */
export class ConnectionFailedError extends TransportError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ConnectionFailedError'
  }
}

/** Indicates an operation exceeded its per-request timeout. */
export class TimeoutError extends TransportError {
  constructor(message: string) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/** Indicates a non-successful HTTP response from the API service. */
export class HTTPError extends TransportError {
  readonly status: number
  readonly body: string
  /** The service's own error message, when it sent one. */
  readonly detail: string

  constructor(status: number, body: string, message: string, detail = '') {
    super(message)
    this.name = 'HTTPError'
    this.status = status
    this.body = body
    this.detail = detail
  }
}

/** A 2xx response whose body does not have the shape the operation reads. */
export class ResponseFormatError extends TransportError {
  readonly route: string

  constructor(route: string, detail: string) {
    super(`Unexpected response from ${route}: ${detail}`)
    this.name = 'ResponseFormatError'
    this.route = route
  }
}

export class RedirectLimitError extends TransportError {
  constructor(limit: number, url: string) {
    super(`Exceeded ${limit} redirects while requesting ${url}`)
    this.name = 'RedirectLimitError'
  }
}

// ── Translation ───────────────────────────────────────────────────────────────

export class TranslationError extends Error {
  readonly index: number

  constructor(index: number, message: string) {
    super(message)
    this.name = 'TranslationError'
    this.index = index
  }
}

export class UnsupportedInstructionError extends TranslationError {
  readonly op: string

  constructor(index: number, op: string) {
    super(index, `Unsupported instruction '${op}' at step ${index + 1}`)
    this.name = 'UnsupportedInstructionError'
    this.op = op
  }
}

export class InvalidInstructionError extends TranslationError {
  constructor(index: number, op: string, detail: string) {
    super(index, `Malformed '${op}' instruction at step ${index + 1}: ${detail}`)
    this.name = 'InvalidInstructionError'
  }
}
