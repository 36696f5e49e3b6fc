import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { Connection } from '../../../src/client/connection.ts'
import { MissingCredentialError } from '../../../src/core/errors.ts'
import { FAST_RETRY_POLICY } from '../../helpers/constants.ts'
import { createTestConnection } from '../../helpers/client.ts'
import { createFetchMock, networkError } from '../../helpers/mocks/fetch.mock.ts'

const PROTOCOL = { refs: {}, instructions: [] }

describe('Connection.submitRun', () => {
  let directory: string

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'transcriptic-submit-'))
  })

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true })
  })

  it('sends the stored token and organization', async () => {
    const configPath = join(directory, 'config.json')
    await fs.writeFile(
      configPath,
      JSON.stringify({ api_root: 'https://x/', organization_id: 'o1', token: 't1' }),
    )
    const fetchMock = createFetchMock()
    fetchMock.pushJson({ id: 'r1' }, { status: 201 })

    const connection = await Connection.fromConfig({
      flags: { configPath },
      env: {},
      fetchImplementation: fetchMock.fetch,
      persistSession: false,
    })
    const run = await connection.submitRun(PROTOCOL, { projectId: 'p1', title: 'Growth' })

    expect(run.id).toBe('r1')
    const [request] = fetchMock.calls
    expect(request.method).toBe('POST')
    expect(request.url).toBe('https://x/o1/p1/runs')
    expect(request.headers.authorization).toBe('Bearer t1')
    expect(request.headers.organization).toBe('o1')
    expect(request.headers['content-type']).toBe('application/json')
  })

  it('retries a dropped connection and submits once', async () => {
    const { connection, fetchMock } = createTestConnection()
    fetchMock.push(networkError())
    fetchMock.pushJson({ id: 'r2' }, { status: 201 })

    const run = await connection.submitRun(PROTOCOL, { projectId: 'p1' })

    expect(run.id).toBe('r2')
    expect(fetchMock.calls).toHaveLength(2)
  })

  it('refuses to submit without a credential', async () => {
    const { connection, fetchMock } = createTestConnection({ config: { credential: undefined } })

    await expect(connection.submitRun(PROTOCOL, { projectId: 'p1' })).rejects.toThrow(
      MissingCredentialError,
    )
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('validates the project id before calling the service', async () => {
    const { connection, fetchMock } = createTestConnection({
      connection: { retryPolicy: FAST_RETRY_POLICY },
    })

    await expect(connection.submitRun(PROTOCOL, { projectId: '' })).rejects.toThrow(
      'projectId must be a non-empty string',
    )
    expect(fetchMock.calls).toHaveLength(0)
  })
})
