import { beforeEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { ApiClient } from '../../../src/core/api-client.ts'
import {
  InvalidCredentialError,
  MissingCredentialError,
  ResponseFormatError,
} from '../../../src/core/errors.ts'
import { Transport } from '../../../src/core/transport.ts'
import { BearerAuthProvider } from '../../../src/providers/auth/bearer-auth.ts'
import type { TRouteContext } from '../../../src/providers/endpoint/routes.ts'
import { FAST_RETRY_POLICY, TEST_CONFIG } from '../../helpers/constants.ts'
import { createFetchMock, type TFetchMock } from '../../helpers/mocks/fetch.mock.ts'

const ProjectSchema = z.object({ id: z.string(), name: z.string() })

describe('ApiClient', () => {
  let fetchMock: TFetchMock
  let context: TRouteContext

  const createClient = (authenticated = true) =>
    new ApiClient({
      transport: new Transport({
        apiRoot: TEST_CONFIG.apiRoot,
        authProvider: authenticated ? new BearerAuthProvider(TEST_CONFIG.token) : undefined,
        retryPolicy: FAST_RETRY_POLICY,
        fetchImplementation: fetchMock.fetch,
      }),
      context: () => context,
    })

  beforeEach(() => {
    fetchMock = createFetchMock()
    context = { apiRoot: TEST_CONFIG.apiRoot, organizationId: TEST_CONFIG.organizationId }
  })

  it('resolves the route and validates the response', async () => {
    fetchMock.pushJson({ id: 'p1', name: 'Growth curves', extra: true })

    const project = await createClient().request(ProjectSchema, 'get_project', {
      project_id: 'p1',
    })

    expect(project).toEqual({ id: 'p1', name: 'Growth curves' })
    expect(fetchMock.calls[0]).toMatchObject({
      method: 'GET',
      url: 'https://api.test.com/test-org/p1',
    })
  })

  it('reads the session context on every call', async () => {
    fetchMock.pushJson([])
    fetchMock.pushJson([])
    const client = createClient()

    await client.send('get_payment_methods')
    context = { ...context, organizationId: 'other-org' }
    await client.send('get_payment_methods')

    expect(fetchMock.calls.map((call) => call.url)).toEqual([
      'https://api.test.com/test-org/payment_methods',
      'https://api.test.com/other-org/payment_methods',
    ])
  })

  it('encodes JSON bodies', async () => {
    fetchMock.pushJson({ id: 'p2', name: 'New' }, { status: 201 })

    await createClient().send('create_project', {}, { json: { name: 'New' } })

    expect(fetchMock.calls[0].headers['content-type']).toBe('application/json')
    expect(fetchMock.jsonBody(0)).toEqual({ name: 'New' })
  })

  it('maps 401 and 403 to InvalidCredentialError', async () => {
    fetchMock.pushJson({ error: 'Invalid token' }, { status: 401 })

    const error = await createClient()
      .send('get_projects')
      .catch((caught: unknown) => caught)

    expect(error).toBeInstanceOf(InvalidCredentialError)
    expect(error).toMatchObject({ message: 'Not authorized (401): Invalid token', status: 401 })
  })

  it('refuses authenticated routes without a credential', async () => {
    await expect(createClient(false).send('get_projects')).rejects.toThrow(MissingCredentialError)
    expect(fetchMock.calls).toHaveLength(0)
  })

  it('sends unauthenticated routes without a credential', async () => {
    fetchMock.pushJson({ success: true })

    await createClient(false).send('execute_protocol', {}, {
      baseUrl: 'http://localhost:5000',
      json: {},
    })

    expect(fetchMock.calls[0].url).toBe('http://localhost:5000/autoprotocol/submit')
  })

  it('reports bodies that do not match the schema', async () => {
    fetchMock.pushJson({ id: 5, name: 'Broken' })

    await expect(
      createClient().request(ProjectSchema, 'get_project', { project_id: 'p1' }),
    ).rejects.toThrow(
      new ResponseFormatError('get_project', 'id: Expected string, received number'),
    )
  })
})
