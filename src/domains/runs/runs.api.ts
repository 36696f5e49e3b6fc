import type { ApiClient } from '../../core/api-client.ts'
import { AnalysisError, HTTPError, NotFoundError, ResponseFormatError } from '../../core/errors.ts'
import { compact, isRecord } from '../../core/utils.ts'
import {
  AnalysisRejectionSchema,
  AnalysisSchema,
  JsonObjectSchema,
  RunDocumentSchema,
  SubmittedRunSchema,
  type TAnalysis,
  type TJsonObject,
  type TProtocolDocument,
  type TRunDocument,
  type TSubmittedRun,
} from '../../types/api.ts'

export type TRunsApiOptions = {
  client: ApiClient
}

export type TSubmitRunOptions = {
  projectId: string
  title?: string
  testMode?: boolean
  paymentMethodId?: string
  signal?: AbortSignal
}

export type TExecuteProtocolOptions = {
  /** Execution target that replaces the API root. */
  baseUrl: string
  deviceSet?: Record<string, unknown>
  signal?: AbortSignal
}

/** Analysis, submission, preview and remote execution of Autoprotocol. */
export class RunsApi {
  private readonly client: ApiClient

  constructor(options: TRunsApiOptions) {
    this.client = options.client
  }

  /**
   * Validates and prices a protocol. Errors already recorded in the document
   * are reported without calling the service.
   */
  public async analyzeRun(
    protocol: TProtocolDocument,
    options: { testMode?: boolean; signal?: AbortSignal } = {},
  ): Promise<TAnalysis> {
    const localErrors = errorMessages(protocol.errors)
    if (localErrors) throw new AnalysisError(localErrors)

    try {
      return await this.client.request(AnalysisSchema, 'analyze_run', {}, {
        json: { protocol, test_mode: options.testMode ?? false },
        signal: options.signal,
      })
    } catch (error) {
      if (error instanceof HTTPError && error.status === 422) {
        throw new AnalysisError(rejectionMessages(error))
      }
      throw error
    }
  }

  public async submitRun(
    protocol: TProtocolDocument,
    options: TSubmitRunOptions,
  ): Promise<TSubmittedRun> {
    const payload = compact({
      title: options.title,
      protocol,
      test_mode: options.testMode ?? false,
      payment_method_id: options.paymentMethodId,
    })

    try {
      return await this.client.request(
        SubmittedRunSchema,
        'submit_run',
        { project_id: options.projectId },
        { json: payload, signal: options.signal },
      )
    } catch (error) {
      if (error instanceof HTTPError && error.status === 404) {
        throw new NotFoundError(
          `Couldn't create run (404). Are you sure the project ${options.projectId} exists, and that you have access to it?`,
        )
      }
      if (error instanceof HTTPError && error.status === 422) {
        throw new AnalysisError(rejectionMessages(error), 'creating run')
      }
      throw error
    }
  }

  /** Uploads a protocol for rendering and returns the preview page URL. */
  public async previewProtocol(protocol: TProtocolDocument, signal?: AbortSignal): Promise<string> {
    const response = await this.client.send('preview_protocol', {}, {
      json: { protocol: JSON.stringify(protocol) },
      followRedirects: false,
      signal,
    })
    const location = response.headers.get('location')
    if (response.status < 300 || response.status >= 400 || !location) {
      throw new ResponseFormatError('preview_protocol', 'Unable to preview protocol')
    }
    return new URL(location, this.client.resolve('preview_protocol').url).toString()
  }

  /** Sends a protocol straight to an execution target instead of the API root. */
  public async executeProtocol(
    protocol: TProtocolDocument,
    options: TExecuteProtocolOptions,
  ): Promise<TJsonObject> {
    return await this.client.request(JsonObjectSchema, 'execute_protocol', {}, {
      baseUrl: options.baseUrl,
      json: compact({ protocol, device_set: options.deviceSet }),
      signal: options.signal,
    })
  }

  public async getRun(runId: string, signal?: AbortSignal): Promise<TRunDocument> {
    return await this.client.request(RunDocumentSchema, 'get_run', { run_id: runId }, { signal })
  }
}

function errorMessages(errors: unknown): string[] | undefined {
  if (!Array.isArray(errors) || errors.length === 0) return undefined
  return errors.map((entry: unknown) =>
    isRecord(entry) && typeof entry.message === 'string' ? entry.message : JSON.stringify(entry),
  )
}

function rejectionMessages(error: HTTPError): string[] {
  let body: unknown
  try {
    body = JSON.parse(error.body)
  } catch {
    body = undefined
  }
  const parsed = AnalysisRejectionSchema.safeParse(body)
  if (parsed.success && parsed.data.protocol.length > 0) {
    return parsed.data.protocol.map((entry) => entry.message)
  }
  return [error.detail || error.body]
}
