import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ConfigurationError } from '../../../src/core/errors.ts'
import { createTestConnection } from '../../helpers/client.ts'
import { makePackage } from '../../helpers/factories.ts'

describe('Connection.uploadRelease', () => {
  let directory: string
  let archive: string

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'transcriptic-release-'))
    archive = join(directory, 'release_v1.zip')
    await fs.writeFile(archive, 'zip-bytes')
  })

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true })
  })

  it('uploads the archive, posts a release and reads its status', async () => {
    const { connection, fetchMock } = createTestConnection()
    fetchMock.pushJson([makePackage({ id: 'pk1', name: 'com.test-org.growth' })])
    fetchMock.pushJson({ key: 'uploads/k1', uri: 'https://storage.example.com/k1?sig=abc' })
    fetchMock.push(new Response(null, { status: 200 }))
    fetchMock.pushJson({ id: 'rel1' }, { status: 201 })
    fetchMock.pushJson({ validation_errors: null })

    const result = await connection.uploadRelease(archive, 'growth', {
      validationDelayInMilliseconds: 0,
    })

    expect(result).toMatchObject({
      packageId: 'pk1',
      release: { id: 'rel1' },
      status: { validation_errors: [] },
    })
    expect(fetchMock.calls.map((call) => `${call.method} ${call.url.split('?')[0]}`)).toEqual([
      'GET https://api.test.com/test-org/packages/',
      'POST https://api.test.com/upload/url_for',
      'PUT https://storage.example.com/k1',
      'POST https://api.test.com/test-org/packages/pk1/releases/',
      'GET https://api.test.com/test-org/packages/pk1/releases/rel1',
    ])

    const upload = fetchMock.calls[2]
    expect(upload.body).toBe('zip-bytes')
    expect(upload.headers.authorization).toBeUndefined()
    expect(upload.headers['content-type']).toBe('application/zip')
    expect(upload.headers['content-disposition']).toBe("attachment; filename='release_v1.zip'")
    expect(fetchMock.jsonBody(1)).toEqual({ name: 'release_v1.zip' })
    expect(fetchMock.jsonBody(3)).toEqual({ release: { upload_id: 'uploads/k1' } })
  })

  it('returns validation errors from the service', async () => {
    const { connection, fetchMock } = createTestConnection()
    fetchMock.pushJson([makePackage({ id: 'pk1', name: 'com.test-org.growth' })])
    fetchMock.pushJson({ key: 'uploads/k1', uri: 'https://storage.example.com/k1' })
    fetchMock.push(new Response(null, { status: 200 }))
    fetchMock.pushJson({ id: 'rel1' })
    fetchMock.pushJson({ validation_errors: [{ message: 'manifest.json is missing' }] })

    const result = await connection.uploadRelease(archive, 'pk1', {
      validationDelayInMilliseconds: 0,
    })

    expect(result.status.validation_errors).toEqual([{ message: 'manifest.json is missing' }])
  })

  it('fails before uploading when the archive cannot be read', async () => {
    const { connection, fetchMock } = createTestConnection()
    fetchMock.pushJson([makePackage({ id: 'pk1', name: 'com.test-org.growth' })])

    await expect(
      connection.uploadRelease(join(directory, 'missing.zip'), 'growth'),
    ).rejects.toThrow(ConfigurationError)
    expect(fetchMock.calls).toHaveLength(1)
  })
})
