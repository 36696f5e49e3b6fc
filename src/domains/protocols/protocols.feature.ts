import { NotFoundError, TimeoutError } from '../../core/errors.ts'
import { sleep } from '../../core/retry.ts'
import type { TLaunchRequest, TProtocol, TQuickLaunch } from '../../types/api.ts'
import type { TProtocolsApi } from './protocols.api.ts'

type TProtocolsFeatureOptions = {
  api: TProtocolsApi
}

export type TWaitForLaunchRequestOptions = {
  intervalInMilliseconds?: number
  maximumPolls?: number
  /** Called after every poll that is not yet complete. */
  onPoll?: (launchRequest: TLaunchRequest, poll: number) => void
  signal?: AbortSignal
}

export type TWaitForQuickLaunchOptions = {
  intervalInMilliseconds?: number
  maximumPolls?: number
  onPoll?: (quickLaunch: TQuickLaunch, poll: number) => void
  signal?: AbortSignal
}

const COMPLETE = 100

export class ProtocolsFeature {
  private api: TProtocolsApi

  constructor(options: TProtocolsFeatureOptions) {
    this.api = options.api
  }

  /** Finds a protocol by name, optionally within one package. The first match wins. */
  public async findProtocol(
    name: string,
    packageId?: string,
    signal?: AbortSignal,
  ): Promise<{ protocol: TProtocol; matches: number }> {
    const protocols = await this.api.listProtocols(signal)
    const matches = protocols.filter(
      (protocol) => protocol.name === name && (!packageId || protocol.package_id === packageId),
    )
    if (matches.length === 0) {
      const scope = packageId ? `package ${packageId}` : 'unspecified package'
      throw new NotFoundError(`Protocol ${name} in ${scope} was not found.`)
    }
    return { protocol: matches[0], matches: matches.length }
  }

  /**
   * Polls a launch request until its inputs are fully configured. The
   * defaults wait up to five minutes.
   */
  public async waitForLaunchRequest(
    protocolId: string,
    launchRequest: TLaunchRequest,
    options: TWaitForLaunchRequestOptions = {},
  ): Promise<TLaunchRequest> {
    const intervalInMilliseconds = options.intervalInMilliseconds ?? 2_000
    const maximumPolls = options.maximumPolls ?? 150

    let current = launchRequest
    for (let poll = 1; current.progress !== COMPLETE; poll++) {
      if (poll > maximumPolls) {
        throw new TimeoutError(
          `Launch request ${launchRequest.id} was not configured after ${maximumPolls} polls`,
        )
      }
      options.onPoll?.(current, poll)
      await sleep(intervalInMilliseconds, options.signal)
      current = await this.api.getLaunchRequest(protocolId, launchRequest.id, options.signal)
    }
    return current
  }

  /**
   * Polls a quick launch until someone saves its inputs in the web app, which
   * shows as a newer `updated_at` with `inputs` set. The defaults wait up to
   * fifteen minutes.
   */
  public async waitForQuickLaunchInputs(
    projectId: string,
    quickLaunch: TQuickLaunch,
    options: TWaitForQuickLaunchOptions = {},
  ): Promise<TQuickLaunch> {
    const intervalInMilliseconds = options.intervalInMilliseconds ?? 5_000
    const maximumPolls = options.maximumPolls ?? 180
    const created = quickLaunch.updated_at ?? ''

    let current = quickLaunch
    for (let poll = 1; current.inputs == null || (current.updated_at ?? '') <= created; poll++) {
      if (poll > maximumPolls) {
        throw new TimeoutError(
          `Inputs for quick launch ${quickLaunch.id} were not configured after ${maximumPolls} polls`,
        )
      }
      options.onPoll?.(current, poll)
      await sleep(intervalInMilliseconds, options.signal)
      current = await this.api.getQuickLaunch(projectId, quickLaunch.id, options.signal)
    }
    return current
  }
}
