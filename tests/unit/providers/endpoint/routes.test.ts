import { describe, expect, it } from 'vitest'
import {
  ConfigurationError,
  MissingParamError,
  UnknownRouteError,
} from '../../../../src/core/errors.ts'
import { isRouteName, resolveRoute, ROUTES } from '../../../../src/providers/endpoint/routes.ts'

const context = { apiRoot: 'https://api.test.com/', organizationId: 'test-org' }

describe('resolveRoute', () => {
  it('fills the API root and organization from the session', () => {
    expect(resolveRoute('get_project_runs', { project_id: 'p123' }, context)).toEqual({
      name: 'get_project_runs',
      url: 'https://api.test.com/test-org/p123/runs',
      method: 'GET',
      requiresAuth: true,
    })
  })

  it('lets params override the session organization', () => {
    const resolved = resolveRoute('get_organization', { org_id: 'other-org' }, context)
    expect(resolved.url).toBe('https://api.test.com/other-org')
  })

  it('percent-encodes parameter values', () => {
    const resolved = resolveRoute('query_resources', { query: 'water & salt' }, context)
    expect(resolved.url).toBe(
      'https://api.test.com/_commercial/resources?q=water%20%26%20salt&per_page=1000',
    )
  })

  it('marks login as unauthenticated', () => {
    expect(resolveRoute('login', {}, context).requiresAuth).toBe(false)
  })

  it('names the missing parameter', () => {
    expect(() => resolveRoute('get_run', {}, context)).toThrow(
      'For route: get_run, argument run_id needs to be provided.',
    )
    expect(() => resolveRoute('get_run', { run_id: '' }, context)).toThrow(MissingParamError)
  })

  it('requires an organization for organization routes', () => {
    expect(() =>
      resolveRoute('get_projects', {}, { apiRoot: context.apiRoot }),
    ).toThrow(new MissingParamError('get_projects', 'org_id'))
  })

  it('rejects unknown route names', () => {
    expect(() => resolveRoute('launch_rockets', {}, context)).toThrow(UnknownRouteError)
  })

  it('appends optional query parameters only when given', () => {
    const base = { data_type: 'temperature', instruction_id: 'i1' }
    expect(resolveRoute('monitoring_data', base, context).url).toBe(
      'https://api.test.com/sensor_data/temperature?instruction_id=i1',
    )
    expect(resolveRoute('monitoring_data', { ...base, grouping: '5:minute' }, context).url).toBe(
      'https://api.test.com/sensor_data/temperature?instruction_id=i1&grouping=5%3Aminute',
    )
  })

  it('accepts a base URL override only where the route allows one', () => {
    const resolved = resolveRoute('execute_protocol', {}, {
      ...context,
      baseUrl: 'http://localhost:5000/',
    })
    expect(resolved.url).toBe('http://localhost:5000/autoprotocol/submit')
    expect(resolved.requiresAuth).toBe(false)

    expect(() =>
      resolveRoute('get_projects', {}, { ...context, baseUrl: 'http://localhost:5000' }),
    ).toThrow(ConfigurationError)
  })
})

describe('isRouteName', () => {
  it('recognises declared routes only', () => {
    expect(isRouteName('submit_run')).toBe(true)
    expect(isRouteName('toString')).toBe(false)
  })

  it('declares a method for every route', () => {
    for (const definition of Object.values(ROUTES)) {
      expect(['GET', 'POST', 'PUT', 'DELETE']).toContain(definition.method)
    }
  })
})
