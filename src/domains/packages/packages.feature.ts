import { ConfigurationError, NotFoundError } from '../../core/errors.ts'
import type { TPackage } from '../../types/api.ts'
import type { TPackagesApi } from './packages.api.ts'

type TPackagesFeatureOptions = {
  api: TPackagesApi
  organizationId: () => string | undefined
}

/** Package names as users see them: lowercased, without the `com.<org>.` prefix. */
export class PackagesFeature {
  private api: TPackagesApi
  private organizationId: () => string | undefined

  constructor(options: TPackagesFeatureOptions) {
    this.api = options.api
    this.organizationId = options.organizationId
  }

  public shortName(pkg: Pick<TPackage, 'name'>): string {
    const name = pkg.name.toLowerCase()
    const prefix = `com.${(this.organizationId() ?? '').toLowerCase()}.`
    return name.startsWith(prefix) ? name.slice(prefix.length) : name
  }

  /** Returns the id of the package addressed by short name or id. */
  public async resolvePackageId(nameOrId: string, signal?: AbortSignal): Promise<string> {
    const packages = await this.api.listPackages(signal)
    const wanted = nameOrId.toLowerCase()

    const matches = packages.filter((pkg) => this.shortName(pkg) === wanted)
    if (matches.length > 1) {
      throw new ConfigurationError(
        `Found multiple packages matching '${nameOrId}': ${matches.map((pkg) => pkg.id).join(', ')}. Use a package id.`,
      )
    }
    if (matches.length === 1) return matches[0].id

    const byId = packages.find((pkg) => pkg.id.toLowerCase() === wanted)
    if (byId) return byId.id
    throw new NotFoundError(`The package '${nameOrId}' does not exist in your organization.`)
  }

  /** Lists packages with their short names, the caller's own first. */
  public async listPackagesByOwner(
    email: string | undefined,
    signal?: AbortSignal,
  ): Promise<{ yours: TPackage[]; theirs: TPackage[] }> {
    const packages = await this.api.listPackages(signal)
    const yours: TPackage[] = []
    const theirs: TPackage[] = []
    for (const pkg of packages) {
      if (email && pkg.owner?.email === email) yours.push(pkg)
      else theirs.push(pkg)
    }
    return { yours, theirs }
  }
}
