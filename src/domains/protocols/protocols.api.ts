import { z } from 'zod'
import type { ApiClient } from '../../core/api-client.ts'
import {
  AnalysisSchema,
  LaunchRequestSchema,
  ProtocolSchema,
  QuickLaunchSchema,
  SubmittedRunSchema,
  type TAnalysis,
  type TLaunchRequest,
  type TProtocol,
  type TQuickLaunch,
  type TSubmittedRun,
} from '../../types/api.ts'
import { compact } from '../../core/utils.ts'

export type TProtocolsApiOptions = {
  client: ApiClient
}

export type TLaunchOptions = {
  testMode?: boolean
  /** Biosafety level the launch is configured for. @default 1 */
  bsl?: number
  signal?: AbortSignal
}

export type TSubmitLaunchRequestOptions = {
  projectId: string
  protocolId?: string
  title?: string
  testMode?: boolean
  paymentMethodId?: string
  signal?: AbortSignal
}

export interface TProtocolsApi {
  listProtocols(signal?: AbortSignal): Promise<TProtocol[]>
  launchProtocol(
    protocolId: string,
    params: Record<string, unknown>,
    options?: TLaunchOptions,
  ): Promise<TLaunchRequest>
  getLaunchRequest(
    protocolId: string,
    launchRequestId: string,
    signal?: AbortSignal,
  ): Promise<TLaunchRequest>
  getQuickLaunch(projectId: string, quickLaunchId: string, signal?: AbortSignal): Promise<TQuickLaunch>
}

/** Protocol listing, launch requests and quick launches. */
export class ProtocolsApi implements TProtocolsApi {
  private readonly client: ApiClient

  constructor(options: TProtocolsApiOptions) {
    this.client = options.client
  }

  public async listProtocols(signal?: AbortSignal): Promise<TProtocol[]> {
    return await this.client.request(z.array(ProtocolSchema), 'get_protocols', {}, { signal })
  }

  public async launchProtocol(
    protocolId: string,
    params: Record<string, unknown>,
    options: TLaunchOptions = {},
  ): Promise<TLaunchRequest> {
    const launchRequest = { ...params, bsl: options.bsl ?? 1, test_mode: options.testMode ?? false }
    return await this.client.request(
      LaunchRequestSchema,
      'launch_protocol',
      { protocol_id: protocolId },
      { json: { launch_request: launchRequest }, signal: options.signal },
    )
  }

  public async getLaunchRequest(
    protocolId: string,
    launchRequestId: string,
    signal?: AbortSignal,
  ): Promise<TLaunchRequest> {
    return await this.client.request(
      LaunchRequestSchema,
      'get_launch_request',
      { protocol_id: protocolId, launch_request_id: launchRequestId },
      { signal },
    )
  }

  public async createQuickLaunch(
    projectId: string,
    manifest: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<TQuickLaunch> {
    return await this.client.request(
      QuickLaunchSchema,
      'create_quick_launch',
      { project_id: projectId },
      { json: { manifest }, signal },
    )
  }

  public async getQuickLaunch(
    projectId: string,
    quickLaunchId: string,
    signal?: AbortSignal,
  ): Promise<TQuickLaunch> {
    return await this.client.request(
      QuickLaunchSchema,
      'get_quick_launch',
      { project_id: projectId, quick_launch_id: quickLaunchId },
      { signal },
    )
  }

  public async resolveQuickLaunchInputs(
    projectId: string,
    quickLaunchId: string,
    inputs: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<TQuickLaunch> {
    return await this.client.request(
      QuickLaunchSchema,
      'resolve_quick_launch_inputs',
      { project_id: projectId, quick_launch_id: quickLaunchId },
      { json: { inputs }, signal },
    )
  }

  public async analyzeLaunchRequest(
    launchRequestId: string,
    options: { testMode?: boolean; signal?: AbortSignal } = {},
  ): Promise<TAnalysis> {
    return await this.client.request(AnalysisSchema, 'analyze_launch_request', {}, {
      json: { launch_request_id: launchRequestId, test_mode: options.testMode ?? false },
      signal: options.signal,
    })
  }

  public async submitLaunchRequest(
    launchRequestId: string,
    options: TSubmitLaunchRequestOptions,
  ): Promise<TSubmittedRun> {
    const payload = compact({
      title: options.title,
      launch_request_id: launchRequestId,
      protocol_id: options.protocolId,
      test_mode: options.testMode ?? false,
      payment_method_id: options.paymentMethodId,
    })
    return await this.client.request(
      SubmittedRunSchema,
      'submit_launch_request',
      { project_id: options.projectId },
      { json: payload, signal: options.signal },
    )
  }
}
