import { promises as fs } from 'fs'
import { basename, extname } from 'path'
import { ConfigurationError } from '../../core/errors.ts'
import { expandHome } from '../../core/config.ts'
import type { TUploadedDataset } from '../../types/api.ts'
import type { DatasetsApi, TUploadDatasetOptions } from './datasets.api.ts'

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.csv': 'text/csv',
  '.json': 'application/json',
  '.txt': 'text/plain',
  '.tsv': 'text/tab-separated-values',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
  '.pdf': 'application/pdf',
  '.zip': 'application/zip',
}

export function contentTypeFor(path: string): string | undefined {
  return CONTENT_TYPES[extname(path).toLowerCase()]
}

type TDatasetsFeatureOptions = {
  api: DatasetsApi
}

export class DatasetsFeature {
  private api: DatasetsApi

  constructor(options: TDatasetsFeatureOptions) {
    this.api = options.api
  }

  /** Reads a local file and uploads it as a dataset; the file name becomes the dataset name. */
  public async uploadDatasetFromFile(
    path: string,
    options: Omit<TUploadDatasetOptions, 'name' | 'contentType'>,
  ): Promise<TUploadedDataset> {
    const resolved = expandHome(path)
    let content: Uint8Array
    try {
      content = await fs.readFile(resolved)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ConfigurationError(`'${path}' has to be a readable file: ${reason}`)
    }

    return await this.api.uploadDataset(content, {
      ...options,
      name: basename(resolved),
      contentType: contentTypeFor(resolved),
    })
  }
}
