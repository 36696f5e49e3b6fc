import type { ApiClient } from '../../core/api-client.ts'
import { HTTPError, NotFoundError } from '../../core/errors.ts'
import {
  JsonObjectSchema,
  UploadedDatasetSchema,
  UploadUriSchema,
  type TJsonObject,
  type TUploadedDataset,
} from '../../types/api.ts'

export type TDatasetsApiOptions = {
  client: ApiClient
}

export type TUploadToUriOptions = {
  name: string
  title: string
  contentType?: string
  signal?: AbortSignal
}

export type TUploadDatasetOptions = TUploadToUriOptions & {
  runId: string
  analysisTool?: string
  analysisToolVersion?: string
}

export class DatasetsApi {
  private readonly client: ApiClient

  constructor(options: TDatasetsApiOptions) {
    this.client = options.client
  }

  public async getDataset(dataId: string, key = '*', signal?: AbortSignal): Promise<TJsonObject> {
    return await this.client.request(
      JsonObjectSchema,
      'dataset',
      { data_id: dataId, key },
      { signal },
    )
  }

  public async listDatasets(
    projectId: string,
    runId: string,
    signal?: AbortSignal,
  ): Promise<TJsonObject> {
    try {
      return await this.client.request(
        JsonObjectSchema,
        'datasets',
        { project_id: projectId, run_id: runId },
        { signal },
      )
    } catch (error) {
      if (error instanceof HTTPError && error.status === 404) {
        throw new NotFoundError(
          `No run found for ID ${runId}. Please ensure you have the right permissions.`,
        )
      }
      throw error
    }
  }

  /**
   * Stores content through a presigned upload URL and returns the storage
   * key. The upload itself goes to the storage host without session headers.
   */
  public async uploadToUri(content: Uint8Array, options: TUploadToUriOptions): Promise<string> {
    const target = await this.client.request(UploadUriSchema, 'upload_uri', {}, {
      json: { name: options.title },
      signal: options.signal,
    })

    const headers: Record<string, string> = {
      'content-disposition': `attachment; filename='${options.name}'`,
    }
    if (options.contentType) headers['content-type'] = options.contentType

    await this.client.sendToUrl(
      { method: 'PUT', url: target.uri, headers, body: content },
      { signal: options.signal },
    )
    return target.key
  }

  /** Uploads content and attaches it to a run as an analysis dataset. */
  public async uploadDataset(
    content: Uint8Array,
    options: TUploadDatasetOptions,
  ): Promise<TUploadedDataset> {
    const key = await this.uploadToUri(content, options)
    return await this.client.request(UploadedDatasetSchema, 'upload_datasets', {}, {
      json: {
        s3_key: key,
        file_name: options.name,
        title: options.title,
        run_id: options.runId,
        analysis_tool: options.analysisTool,
        analysis_tool_version: options.analysisToolVersion,
      },
      signal: options.signal,
    })
  }

  /** Downloads the zip archive of a dataset. */
  public async getZip(dataId: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.client.send('get_data_zip', { data_id: dataId }, { signal })
    return response.bytes
  }

  public async getRawImage(dataId: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.client.send('view_raw_image', { data_id: dataId }, { signal })
    return response.bytes
  }
}
