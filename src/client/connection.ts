import { promises as fs } from 'fs'
import { basename } from 'path'
import { ApiClient } from '../core/api-client.ts'
import {
  expandHome,
  loadSessionConfig,
  saveSessionConfig,
  type TLoadSessionConfigOptions,
  type TSessionConfig,
} from '../core/config.ts'
import { ConfigurationError, HTTPError, NotFoundError } from '../core/errors.ts'
import { logger } from '../core/logger.ts'
import { sleep } from '../core/retry.ts'
import { Transport } from '../core/transport.ts'
import type { TRetryPolicy } from '../core/types.ts'
import { normalizeBaseUrl, validateRequiredStrings } from '../core/utils.ts'
import { AuthApi } from '../domains/auth/auth.api.ts'
import { CatalogApi, type TMonitoringDataQuery } from '../domains/catalog/catalog.api.ts'
import { CatalogFeature, type TUsableResource } from '../domains/catalog/catalog.feature.ts'
import {
  DatasetsApi,
  type TUploadDatasetOptions,
  type TUploadToUriOptions,
} from '../domains/datasets/datasets.api.ts'
import { DatasetsFeature } from '../domains/datasets/datasets.feature.ts'
import { OrganizationsApi } from '../domains/organizations/organizations.api.ts'
import { PackagesApi } from '../domains/packages/packages.api.ts'
import { PackagesFeature } from '../domains/packages/packages.feature.ts'
import { ProjectsApi } from '../domains/projects/projects.api.ts'
import { ProjectsFeature } from '../domains/projects/projects.feature.ts'
import {
  ProtocolsApi,
  type TLaunchOptions,
  type TSubmitLaunchRequestOptions,
} from '../domains/protocols/protocols.api.ts'
import {
  ProtocolsFeature,
  type TWaitForLaunchRequestOptions,
  type TWaitForQuickLaunchOptions,
} from '../domains/protocols/protocols.feature.ts'
import {
  RunsApi,
  type TExecuteProtocolOptions,
  type TSubmitRunOptions,
} from '../domains/runs/runs.api.ts'
import { createAuthProvider } from '../providers/auth/auth-provider.ts'
import type { TRouteName, TRouteParams } from '../providers/endpoint/routes.ts'
import type {
  TAnalysis,
  TJsonObject,
  TKitResults,
  TLaunchRequest,
  TOrganization,
  TPackage,
  TPaymentMethod,
  TProject,
  TProtocol,
  TProtocolDocument,
  TQuickLaunch,
  TRelease,
  TReleaseStatus,
  TResourceResults,
  TRun,
  TRunDocument,
  TSearchResults,
  TSubmittedRun,
  TUploadedDataset,
} from '../types/api.ts'

export type TConnectionOptions = {
  config: TSessionConfig
  fetchImplementation?: typeof fetch
  retryPolicy?: TRetryPolicy
  timeoutInMilliseconds?: number
  maximumRedirects?: number
  /** Log every request at debug level. */
  verbose?: boolean
  /** Write login and organization changes back to the config file. @default true */
  persistSession?: boolean
  /** Clock for request signatures. */
  now?: () => Date
}

export type TLoginOptions = {
  /** Organization to select; otherwise `chooseOrganization` is asked, or the only one is used. */
  organizationId?: string
  chooseOrganization?: (organizations: TOrganization[]) => Promise<string> | string
  signal?: AbortSignal
}

export type TUploadReleaseOptions = {
  /** Time the service needs to validate a release before its status is read. @default 10000 */
  validationDelayInMilliseconds?: number
  signal?: AbortSignal
}

export type TUploadReleaseResult = {
  packageId: string
  release: TRelease
  status: TReleaseStatus
}

/**
 * Public client surface. Composes the session config, the auth provider,
 * the route table and the transport, and exposes every remote operation.
 */
export class Connection {
  private config: TSessionConfig
  private readonly persistSession: boolean
  private readonly now?: () => Date
  private readonly transport: Transport
  private readonly client: ApiClient

  private readonly authApi: AuthApi
  private readonly organizationsApi: OrganizationsApi
  private readonly projectsApi: ProjectsApi
  private readonly projectsFeature: ProjectsFeature
  private readonly packagesApi: PackagesApi
  private readonly packagesFeature: PackagesFeature
  private readonly protocolsApi: ProtocolsApi
  private readonly protocolsFeature: ProtocolsFeature
  private readonly runsApi: RunsApi
  private readonly datasetsApi: DatasetsApi
  private readonly datasetsFeature: DatasetsFeature
  private readonly catalogApi: CatalogApi
  private readonly catalogFeature: CatalogFeature

  constructor(options: TConnectionOptions) {
    this.config = { ...options.config, apiRoot: normalizeBaseUrl(options.config.apiRoot) }
    this.persistSession = options.persistSession ?? true
    this.now = options.now
    if (options.verbose) logger.setVerbose(true)

    this.transport = new Transport({
      apiRoot: this.config.apiRoot,
      organizationId: this.config.organizationId,
      authProvider: this.config.credential
        ? createAuthProvider(this.config.credential, { now: this.now })
        : undefined,
      retryPolicy: options.retryPolicy,
      timeoutInMilliseconds: options.timeoutInMilliseconds,
      maximumRedirects: options.maximumRedirects,
      fetchImplementation: options.fetchImplementation,
    })
    this.client = new ApiClient({
      transport: this.transport,
      context: () => ({ apiRoot: this.config.apiRoot, organizationId: this.config.organizationId }),
    })

    const organizationId = (): string | undefined => this.config.organizationId

    this.authApi = new AuthApi({ client: this.client })
    this.organizationsApi = new OrganizationsApi({ client: this.client })
    this.projectsApi = new ProjectsApi({ client: this.client })
    this.projectsFeature = new ProjectsFeature({ api: this.projectsApi })
    this.packagesApi = new PackagesApi({ client: this.client, organizationId })
    this.packagesFeature = new PackagesFeature({ api: this.packagesApi, organizationId })
    this.protocolsApi = new ProtocolsApi({ client: this.client })
    this.protocolsFeature = new ProtocolsFeature({ api: this.protocolsApi })
    this.runsApi = new RunsApi({ client: this.client })
    this.datasetsApi = new DatasetsApi({ client: this.client })
    this.datasetsFeature = new DatasetsFeature({ api: this.datasetsApi })
    this.catalogApi = new CatalogApi({ client: this.client })
    this.catalogFeature = new CatalogFeature({ api: this.catalogApi })
  }

  /** Loads the session config from flags, environment and config file, then connects. */
  static async fromConfig(
    options: TLoadSessionConfigOptions & Omit<TConnectionOptions, 'config'> = {},
  ): Promise<Connection> {
    const { flags, env, ...connectionOptions } = options
    const config = await loadSessionConfig({ flags, env })
    return new Connection({ ...connectionOptions, config })
  }

  // ── Session ─────────────────────────────────────────────────────────────────

  get session(): Readonly<TSessionConfig> {
    return this.config
  }

  get apiRoot(): string {
    return this.config.apiRoot
  }

  get organizationId(): string | undefined {
    return this.config.organizationId
  }

  /** Web URL for a path: absolute paths hang off the API root, others off the organization. */
  url(path: string): string {
    if (path.startsWith('/')) return `${this.config.apiRoot}${path}`
    return `${this.config.apiRoot}/${this.requireOrganization()}/${path}`
  }

  /** Resolved URL of a named route in this session. */
  route(name: TRouteName, params: TRouteParams = {}): string {
    return this.client.resolve(name, params).url
  }

  /**
   * Signs in with email and password, selects an organization and, once the
   * organization is confirmed reachable with the new token, stores the
   * session. Nothing changes if any step fails.
   */
  async login(email: string, password: string, options: TLoginOptions = {}): Promise<TSessionConfig> {
    validateRequiredStrings({ email, password }, ['email', 'password'])

    const { user, token } = await this.authApi.signIn(email, password, options.signal)
    const organizationId = await this.pickOrganization(user.organizations, options)

    const previous = this.config
    const next: TSessionConfig = {
      ...previous,
      email: user.email,
      userId: user.id,
      organizationId,
      credential: { kind: 'bearer', token },
      credentialOrigin: 'file',
      featureGroups: user.feature_groups ?? [],
    }

    this.applySession(next)
    try {
      await this.organizationsApi.getOrganization(organizationId, options.signal)
    } catch (error) {
      this.applySession(previous)
      throw error
    }

    if (this.persistSession) await saveSessionConfig(next, { includeToken: true })
    return next
  }

  /** Switches to another organization after confirming it is accessible. */
  async selectOrganization(organizationId: string, signal?: AbortSignal): Promise<void> {
    validateRequiredStrings({ organizationId }, ['organizationId'])
    try {
      await this.organizationsApi.getOrganization(organizationId, signal)
    } catch (error) {
      if (error instanceof HTTPError && error.status === 404) {
        throw new NotFoundError(`There was an error fetching the organization ${organizationId}`)
      }
      throw error
    }

    this.applySession({ ...this.config, organizationId })
    if (this.persistSession) await saveSessionConfig(this.config)
  }

  // ── Organizations ───────────────────────────────────────────────────────────

  async organizations(signal?: AbortSignal): Promise<TOrganization[]> {
    return await this.organizationsApi.listOrganizations(signal)
  }

  async getOrganization(organizationId?: string, signal?: AbortSignal): Promise<TJsonObject> {
    return await this.organizationsApi.getOrganization(organizationId, signal)
  }

  // ── Projects ────────────────────────────────────────────────────────────────

  async projects(signal?: AbortSignal): Promise<TProject[]> {
    return await this.projectsApi.listProjects(signal)
  }

  async project(projectId: string, signal?: AbortSignal): Promise<TJsonObject> {
    validateRequiredStrings({ projectId }, ['projectId'])
    return await this.projectsApi.getProject(projectId, signal)
  }

  async runs(projectId: string, signal?: AbortSignal): Promise<TRun[]> {
    validateRequiredStrings({ projectId }, ['projectId'])
    return await this.projectsApi.listRuns(projectId, signal)
  }

  async createProject(title: string, signal?: AbortSignal): Promise<{ id: string }> {
    validateRequiredStrings({ title }, ['title'])
    return await this.projectsApi.createProject(title, signal)
  }

  async deleteProject(projectId: string, signal?: AbortSignal): Promise<void> {
    validateRequiredStrings({ projectId }, ['projectId'])
    await this.projectsApi.deleteProject(projectId, signal)
  }

  async archiveProject(projectId: string, signal?: AbortSignal): Promise<void> {
    validateRequiredStrings({ projectId }, ['projectId'])
    await this.projectsApi.archiveProject(projectId, signal)
  }

  /** Project id for an id or a unique project name. */
  async resolveProject(nameOrId: string, signal?: AbortSignal): Promise<string> {
    validateRequiredStrings({ nameOrId }, ['nameOrId'])
    return await this.projectsFeature.resolveProjectId(nameOrId, signal)
  }

  async projectName(nameOrId: string, signal?: AbortSignal): Promise<string> {
    validateRequiredStrings({ nameOrId }, ['nameOrId'])
    return await this.projectsFeature.resolveProjectName(nameOrId, signal)
  }

  // ── Packages ────────────────────────────────────────────────────────────────

  async packages(signal?: AbortSignal): Promise<TPackage[]> {
    return await this.packagesApi.listPackages(signal)
  }

  async packagesByOwner(signal?: AbortSignal): Promise<{ yours: TPackage[]; theirs: TPackage[] }> {
    return await this.packagesFeature.listPackagesByOwner(this.config.email, signal)
  }

  packageShortName(pkg: Pick<TPackage, 'name'>): string {
    return this.packagesFeature.shortName(pkg)
  }

  async package(packageId: string, signal?: AbortSignal): Promise<TPackage> {
    validateRequiredStrings({ packageId }, ['packageId'])
    return await this.packagesApi.getPackage(packageId, signal)
  }

  /** Creates a package named `com.<organization>.<name>`. */
  async createPackage(name: string, description: string, signal?: AbortSignal): Promise<TPackage> {
    validateRequiredStrings({ name }, ['name'])
    this.requireOrganization()
    return await this.packagesApi.createPackage(name, description, signal)
  }

  async deletePackage(packageId: string, signal?: AbortSignal): Promise<void> {
    validateRequiredStrings({ packageId }, ['packageId'])
    await this.packagesApi.deletePackage(packageId, signal)
  }

  async postRelease(packageId: string, uploadId: string, signal?: AbortSignal): Promise<TRelease> {
    validateRequiredStrings({ packageId, uploadId }, ['packageId', 'uploadId'])
    return await this.packagesApi.postRelease(packageId, uploadId, signal)
  }

  async releaseStatus(
    packageId: string,
    releaseId: string,
    signal?: AbortSignal,
  ): Promise<TReleaseStatus> {
    validateRequiredStrings({ packageId, releaseId }, ['packageId', 'releaseId'])
    return await this.packagesApi.getReleaseStatus(packageId, releaseId, signal)
  }

  /** Package id for a package id or short name. */
  async resolvePackage(nameOrId: string, signal?: AbortSignal): Promise<string> {
    validateRequiredStrings({ nameOrId }, ['nameOrId'])
    return await this.packagesFeature.resolvePackageId(nameOrId, signal)
  }

  /**
   * Uploads a release archive built elsewhere to a package, then reads the
   * validation result once the service has had time to check it.
   */
  async uploadRelease(
    archivePath: string,
    packageNameOrId: string,
    options: TUploadReleaseOptions = {},
  ): Promise<TUploadReleaseResult> {
    const packageId = await this.resolvePackage(packageNameOrId, options.signal)
    const content = await readLocalFile(archivePath)
    const name = basename(archivePath)

    const uploadId = await this.datasetsApi.uploadToUri(content, {
      name,
      title: name,
      contentType: 'application/zip',
      signal: options.signal,
    })
    const release = await this.packagesApi.postRelease(packageId, uploadId, options.signal)
    await sleep(options.validationDelayInMilliseconds ?? 10_000, options.signal)
    const status = await this.packagesApi.getReleaseStatus(packageId, release.id, options.signal)
    return { packageId, release, status }
  }

  // ── Protocols & launch ──────────────────────────────────────────────────────

  async protocols(signal?: AbortSignal): Promise<TProtocol[]> {
    return await this.protocolsApi.listProtocols(signal)
  }

  async findProtocol(
    name: string,
    packageId?: string,
    signal?: AbortSignal,
  ): Promise<{ protocol: TProtocol; matches: number }> {
    validateRequiredStrings({ name }, ['name'])
    return await this.protocolsFeature.findProtocol(name, packageId, signal)
  }

  async launchProtocol(
    protocolId: string,
    params: Record<string, unknown>,
    options?: TLaunchOptions,
  ): Promise<TLaunchRequest> {
    validateRequiredStrings({ protocolId }, ['protocolId'])
    return await this.protocolsApi.launchProtocol(protocolId, params, options)
  }

  async launchRequest(
    protocolId: string,
    launchRequestId: string,
    signal?: AbortSignal,
  ): Promise<TLaunchRequest> {
    validateRequiredStrings({ protocolId, launchRequestId }, ['protocolId', 'launchRequestId'])
    return await this.protocolsApi.getLaunchRequest(protocolId, launchRequestId, signal)
  }

  async waitForLaunchRequest(
    protocolId: string,
    launchRequest: TLaunchRequest,
    options?: TWaitForLaunchRequestOptions,
  ): Promise<TLaunchRequest> {
    return await this.protocolsFeature.waitForLaunchRequest(protocolId, launchRequest, options)
  }

  async createQuickLaunch(
    projectId: string,
    manifest: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<TQuickLaunch> {
    validateRequiredStrings({ projectId }, ['projectId'])
    return await this.protocolsApi.createQuickLaunch(projectId, manifest, signal)
  }

  async quickLaunch(
    projectId: string,
    quickLaunchId: string,
    signal?: AbortSignal,
  ): Promise<TQuickLaunch> {
    validateRequiredStrings({ projectId, quickLaunchId }, ['projectId', 'quickLaunchId'])
    return await this.protocolsApi.getQuickLaunch(projectId, quickLaunchId, signal)
  }

  /** Waits until the quick launch's inputs have been saved from the web app. */
  async waitForQuickLaunchInputs(
    projectId: string,
    quickLaunch: TQuickLaunch,
    options?: TWaitForQuickLaunchOptions,
  ): Promise<TQuickLaunch> {
    validateRequiredStrings({ projectId }, ['projectId'])
    return await this.protocolsFeature.waitForQuickLaunchInputs(projectId, quickLaunch, options)
  }

  async resolveQuickLaunchInputs(
    projectId: string,
    quickLaunchId: string,
    inputs: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<TQuickLaunch> {
    validateRequiredStrings({ projectId, quickLaunchId }, ['projectId', 'quickLaunchId'])
    return await this.protocolsApi.resolveQuickLaunchInputs(projectId, quickLaunchId, inputs, signal)
  }

  async analyzeLaunchRequest(
    launchRequestId: string,
    options?: { testMode?: boolean; signal?: AbortSignal },
  ): Promise<TAnalysis> {
    validateRequiredStrings({ launchRequestId }, ['launchRequestId'])
    return await this.protocolsApi.analyzeLaunchRequest(launchRequestId, options)
  }

  async submitLaunchRequest(
    launchRequestId: string,
    options: TSubmitLaunchRequestOptions,
  ): Promise<TSubmittedRun> {
    validateRequiredStrings(
      { launchRequestId, projectId: options.projectId },
      ['launchRequestId', 'projectId'],
    )
    return await this.protocolsApi.submitLaunchRequest(launchRequestId, options)
  }

  // ── Runs ────────────────────────────────────────────────────────────────────

  async analyzeRun(
    protocol: TProtocolDocument,
    options?: { testMode?: boolean; signal?: AbortSignal },
  ): Promise<TAnalysis> {
    return await this.runsApi.analyzeRun(protocol, options)
  }

  async submitRun(protocol: TProtocolDocument, options: TSubmitRunOptions): Promise<TSubmittedRun> {
    validateRequiredStrings({ projectId: options.projectId }, ['projectId'])
    return await this.runsApi.submitRun(protocol, options)
  }

  async previewProtocol(protocol: TProtocolDocument, signal?: AbortSignal): Promise<string> {
    return await this.runsApi.previewProtocol(protocol, signal)
  }

  async executeProtocol(
    protocol: TProtocolDocument,
    options: TExecuteProtocolOptions,
  ): Promise<TJsonObject> {
    validateRequiredStrings({ baseUrl: options.baseUrl }, ['baseUrl'])
    return await this.runsApi.executeProtocol(protocol, options)
  }

  async run(runId: string, signal?: AbortSignal): Promise<TRunDocument> {
    validateRequiredStrings({ runId }, ['runId'])
    return await this.runsApi.getRun(runId, signal)
  }

  // ── Datasets ────────────────────────────────────────────────────────────────

  async dataset(dataId: string, key = '*', signal?: AbortSignal): Promise<TJsonObject> {
    validateRequiredStrings({ dataId }, ['dataId'])
    return await this.datasetsApi.getDataset(dataId, key, signal)
  }

  async datasets(projectId: string, runId: string, signal?: AbortSignal): Promise<TJsonObject> {
    validateRequiredStrings({ projectId, runId }, ['projectId', 'runId'])
    return await this.datasetsApi.listDatasets(projectId, runId, signal)
  }

  async uploadToUri(content: Uint8Array, options: TUploadToUriOptions): Promise<string> {
    return await this.datasetsApi.uploadToUri(content, options)
  }

  async uploadDataset(content: Uint8Array, options: TUploadDatasetOptions): Promise<TUploadedDataset> {
    validateRequiredStrings({ runId: options.runId }, ['runId'])
    return await this.datasetsApi.uploadDataset(content, options)
  }

  async uploadDatasetFromFile(
    path: string,
    options: Omit<TUploadDatasetOptions, 'name' | 'contentType'>,
  ): Promise<TUploadedDataset> {
    validateRequiredStrings({ path, runId: options.runId }, ['path', 'runId'])
    return await this.datasetsFeature.uploadDatasetFromFile(path, options)
  }

  async getZip(dataId: string, signal?: AbortSignal): Promise<Uint8Array> {
    validateRequiredStrings({ dataId }, ['dataId'])
    return await this.datasetsApi.getZip(dataId, signal)
  }

  async rawImageData(dataId: string, signal?: AbortSignal): Promise<Uint8Array> {
    validateRequiredStrings({ dataId }, ['dataId'])
    return await this.datasetsApi.getRawImage(dataId, signal)
  }

  // ── Catalog ─────────────────────────────────────────────────────────────────

  async resources(query: string, signal?: AbortSignal): Promise<TResourceResults> {
    return await this.catalogApi.queryResources(query, signal)
  }

  async usableResources(query: string, signal?: AbortSignal): Promise<TUsableResource[]> {
    return await this.catalogFeature.findUsableResources(query, signal)
  }

  async kits(query: string, signal?: AbortSignal): Promise<TKitResults> {
    return await this.catalogApi.queryKits(query, signal)
  }

  async inventory(query: string, page = 0, signal?: AbortSignal): Promise<TSearchResults> {
    return await this.catalogApi.queryInventory(query, page, signal)
  }

  async paymentMethods(signal?: AbortSignal): Promise<TPaymentMethod[]> {
    return await this.catalogApi.listPaymentMethods(signal)
  }

  async isValidPaymentMethod(paymentMethodId: string, signal?: AbortSignal): Promise<boolean> {
    return await this.catalogFeature.isValidPaymentMethod(paymentMethodId, signal)
  }

  async monitoringData(query: TMonitoringDataQuery): Promise<TJsonObject> {
    validateRequiredStrings(
      { dataType: query.dataType, instructionId: query.instructionId },
      ['dataType', 'instructionId'],
    )
    return await this.catalogApi.getMonitoringData(query)
  }

  async getObject(objectId: string, objectType?: string, signal?: AbortSignal): Promise<TJsonObject> {
    validateRequiredStrings({ objectId }, ['objectId'])
    return await this.catalogApi.getObject(objectId, objectType, signal)
  }

  // ── Private ─────────────────────────────────────────────────────────────────

  private applySession(config: TSessionConfig): void {
    this.config = config
    this.transport.setApiRoot(config.apiRoot)
    this.transport.setOrganizationId(config.organizationId)
    this.transport.setAuthProvider(
      config.credential ? createAuthProvider(config.credential, { now: this.now }) : undefined,
    )
  }

  private requireOrganization(): string {
    if (!this.config.organizationId) {
      throw new ConfigurationError(
        'No organization selected. Run `transcriptic select-org` or pass --organization.',
      )
    }
    return this.config.organizationId
  }

  private async pickOrganization(
    organizations: TOrganization[],
    options: TLoginOptions,
  ): Promise<string> {
    if (options.organizationId) return options.organizationId
    if (organizations.length === 0) {
      throw new ConfigurationError(
        `You don't appear to belong to any organizations. Visit ${this.config.apiRoot} and create an organization.`,
      )
    }
    if (organizations.length === 1) return organizations[0].subdomain
    if (!options.chooseOrganization) {
      const subdomains = organizations.map((organization) => organization.subdomain)
      throw new ConfigurationError(
        `You belong to several organizations (${subdomains.join(', ')}). Pass one with --organization.`,
      )
    }
    return await options.chooseOrganization(organizations)
  }
}

async function readLocalFile(path: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(expandHome(path))
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Could not read ${path}: ${reason}`)
  }
}
