import { z } from 'zod'
import type { ApiClient } from '../../core/api-client.ts'
import { HTTPError, NotFoundError } from '../../core/errors.ts'
import {
  JsonObjectSchema,
  KitResultsSchema,
  PaymentMethodSchema,
  ResourceResultsSchema,
  SearchResultsSchema,
  type TJsonObject,
  type TKitResults,
  type TPaymentMethod,
  type TResourceResults,
  type TSearchResults,
} from '../../types/api.ts'

export type TCatalogApiOptions = {
  client: ApiClient
}

export type TMonitoringDataQuery = {
  dataType: string
  instructionId: string
  grouping?: string
  startTime?: string
  endTime?: string
  signal?: AbortSignal
}

/** Commercial catalog, inventory, payment methods, sensor data and object lookup. */
export class CatalogApi {
  private readonly client: ApiClient

  constructor(options: TCatalogApiOptions) {
    this.client = options.client
  }

  public async queryResources(query: string, signal?: AbortSignal): Promise<TResourceResults> {
    return await this.client.request(ResourceResultsSchema, 'query_resources', { query }, { signal })
  }

  public async queryKits(query: string, signal?: AbortSignal): Promise<TKitResults> {
    return await this.client.request(KitResultsSchema, 'query_kits', { query }, { signal })
  }

  public async queryInventory(
    query: string,
    page = 0,
    signal?: AbortSignal,
  ): Promise<TSearchResults> {
    return await this.client.request(
      SearchResultsSchema,
      'query_inventory',
      { query, page },
      { signal },
    )
  }

  public async listPaymentMethods(signal?: AbortSignal): Promise<TPaymentMethod[]> {
    return await this.client.request(
      z.array(PaymentMethodSchema),
      'get_payment_methods',
      {},
      { signal },
    )
  }

  public async getMonitoringData(query: TMonitoringDataQuery): Promise<TJsonObject> {
    return await this.client.request(
      JsonObjectSchema,
      'monitoring_data',
      {
        data_type: query.dataType,
        instruction_id: query.instructionId,
        grouping: query.grouping,
        start_time: query.startTime,
        end_time: query.endTime,
      },
      { signal: query.signal },
    )
  }

  /** Loads any object by id. Datasets have their own route; everything else goes through deref. */
  public async getObject(
    objectId: string,
    objectType?: string,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    try {
      if (objectType === 'dataset') {
        return await this.client.request(
          JsonObjectSchema,
          'dataset_short',
          { data_id: objectId },
          { signal },
        )
      }
      return await this.client.request(JsonObjectSchema, 'deref_route', { obj_id: objectId }, { signal })
    } catch (error) {
      if (error instanceof HTTPError && error.status === 404) {
        throw new NotFoundError(`No object found for ID ${objectId}`)
      }
      throw error
    }
  }
}
