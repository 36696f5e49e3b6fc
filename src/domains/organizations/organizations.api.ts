import { z } from 'zod'
import type { ApiClient } from '../../core/api-client.ts'
import { JsonObjectSchema, OrganizationSchema, type TJsonObject, type TOrganization } from '../../types/api.ts'

export type TOrganizationsApiOptions = {
  client: ApiClient
}

export class OrganizationsApi {
  private readonly client: ApiClient

  constructor(options: TOrganizationsApiOptions) {
    this.client = options.client
  }

  async listOrganizations(signal?: AbortSignal): Promise<TOrganization[]> {
    return await this.client.request(z.array(OrganizationSchema), 'get_organizations', {}, { signal })
  }

  /** Fetches one organization; without an id, the session's organization. */
  async getOrganization(organizationId?: string, signal?: AbortSignal): Promise<TJsonObject> {
    return await this.client.request(
      JsonObjectSchema,
      'get_organization',
      { org_id: organizationId },
      { signal },
    )
  }
}
