import { z } from 'zod'
import type { ApiClient } from '../../core/api-client.ts'
import {
  PackageSchema,
  ReleaseSchema,
  ReleaseStatusSchema,
  type TPackage,
  type TRelease,
  type TReleaseStatus,
} from '../../types/api.ts'

export type TPackagesApiOptions = {
  client: ApiClient
  /** Used for the `com.<org>.` prefix of new package names. */
  organizationId: () => string | undefined
}

export interface TPackagesApi {
  listPackages(signal?: AbortSignal): Promise<TPackage[]>
  getPackage(packageId: string, signal?: AbortSignal): Promise<TPackage>
  createPackage(name: string, description: string, signal?: AbortSignal): Promise<TPackage>
  deletePackage(packageId: string, signal?: AbortSignal): Promise<void>
  postRelease(packageId: string, uploadId: string, signal?: AbortSignal): Promise<TRelease>
  getReleaseStatus(
    packageId: string,
    releaseId: string,
    signal?: AbortSignal,
  ): Promise<TReleaseStatus>
}

export class PackagesApi implements TPackagesApi {
  private readonly client: ApiClient
  private readonly organizationId: () => string | undefined

  constructor(options: TPackagesApiOptions) {
    this.client = options.client
    this.organizationId = options.organizationId
  }

  public async listPackages(signal?: AbortSignal): Promise<TPackage[]> {
    return await this.client.request(z.array(PackageSchema), 'get_packages', {}, { signal })
  }

  public async getPackage(packageId: string, signal?: AbortSignal): Promise<TPackage> {
    return await this.client.request(
      PackageSchema,
      'get_package',
      { package_id: packageId },
      { signal },
    )
  }

  public async createPackage(
    name: string,
    description: string,
    signal?: AbortSignal,
  ): Promise<TPackage> {
    return await this.client.request(PackageSchema, 'create_package', {}, {
      json: { name: `com.${this.organizationId() ?? ''}.${name}`, description },
      signal,
    })
  }

  public async deletePackage(packageId: string, signal?: AbortSignal): Promise<void> {
    await this.client.send('delete_package', { package_id: packageId }, { signal })
  }

  public async postRelease(
    packageId: string,
    uploadId: string,
    signal?: AbortSignal,
  ): Promise<TRelease> {
    return await this.client.request(
      ReleaseSchema,
      'post_release',
      { package_id: packageId },
      { json: { release: { upload_id: uploadId } }, signal },
    )
  }

  public async getReleaseStatus(
    packageId: string,
    releaseId: string,
    signal?: AbortSignal,
  ): Promise<TReleaseStatus> {
    // The timestamp defeats intermediate caches while the release is validated.
    return await this.client.request(
      ReleaseStatusSchema,
      'get_release_status',
      { package_id: packageId, release_id: releaseId, timestamp: Date.now() },
      { signal },
    )
  }
}
