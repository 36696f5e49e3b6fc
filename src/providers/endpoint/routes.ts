import { ConfigurationError, MissingParamError, UnknownRouteError } from '../../core/errors.ts'
import type { THttpMethod } from '../../core/types.ts'
import { normalizeBaseUrl } from '../../core/utils.ts'

export type TRoute = {
  readonly template: string
  readonly method: THttpMethod
  readonly requiresAuth: boolean
  /** Query parameters appended only when a value is supplied. */
  readonly optionalQuery?: readonly string[]
  /** Whether `{api_root}` may be replaced by an explicit base URL. */
  readonly acceptsBaseUrl?: boolean
}

const route = (
  method: THttpMethod,
  template: string,
  extra?: Partial<Omit<TRoute, 'method' | 'template'>>,
): TRoute => Object.freeze({ method, template, requiresAuth: true, ...extra })

/**
 * Every API operation by name. `{api_root}` and `{org_id}` come from the
 * session; the other placeholders are supplied per call.
 */
export const ROUTES = Object.freeze({
  login: route('POST', '{api_root}/users/sign_in', { requiresAuth: false }),
  get_organizations: route('GET', '{api_root}/organizations'),
  get_organization: route('GET', '{api_root}/{org_id}'),

  create_project: route('POST', '{api_root}/{org_id}'),
  get_project: route('GET', '{api_root}/{org_id}/{project_id}'),
  delete_project: route('DELETE', '{api_root}/{org_id}/{project_id}'),
  archive_project: route('PUT', '{api_root}/{org_id}/{project_id}'),
  get_projects: route('GET', '{api_root}/{org_id}/?q=&per_page=500'),
  get_project_runs: route('GET', '{api_root}/{org_id}/{project_id}/runs'),

  create_package: route('POST', '{api_root}/{org_id}/packages'),
  get_package: route('GET', '{api_root}/{org_id}/packages/{package_id}'),
  delete_package: route('DELETE', '{api_root}/{org_id}/packages/{package_id}'),
  get_packages: route('GET', '{api_root}/{org_id}/packages/'),
  post_release: route('POST', '{api_root}/{org_id}/packages/{package_id}/releases/'),
  get_release_status: route(
    'GET',
    '{api_root}/{org_id}/packages/{package_id}/releases/{release_id}?_={timestamp}',
  ),

  get_protocols: route('GET', '{api_root}/{org_id}/protocols'),
  launch_protocol: route('POST', '{api_root}/{org_id}/protocols/{protocol_id}/launch'),
  get_launch_request: route(
    'GET',
    '{api_root}/{org_id}/protocols/{protocol_id}/launch/{launch_request_id}',
  ),
  create_quick_launch: route('POST', '{api_root}/{org_id}/{project_id}/runs/quick_launch'),
  get_quick_launch: route(
    'GET',
    '{api_root}/{org_id}/{project_id}/runs/quick_launch/{quick_launch_id}',
  ),
  resolve_quick_launch_inputs: route(
    'POST',
    '{api_root}/{org_id}/{project_id}/runs/quick_launch/{quick_launch_id}/resolve_inputs',
  ),

  analyze_run: route('POST', '{api_root}/{org_id}/analyze_run'),
  analyze_launch_request: route('POST', '{api_root}/{org_id}/analyze_run'),
  submit_run: route('POST', '{api_root}/{org_id}/{project_id}/runs'),
  submit_launch_request: route('POST', '{api_root}/{org_id}/{project_id}/runs'),
  get_run: route('GET', '{api_root}/api/runs/{run_id}?fields[runs]=project_id'),
  preview_protocol: route('POST', '{api_root}/runs/preview'),
  execute_protocol: route('POST', '{api_root}/autoprotocol/submit', {
    requiresAuth: false,
    acceptsBaseUrl: true,
  }),

  query_kits: route('GET', '{api_root}/_commercial/kits?q={query}&per_page=1000&full_json=true'),
  query_resources: route('GET', '{api_root}/_commercial/resources?q={query}&per_page=1000'),
  query_inventory: route(
    'GET',
    '{api_root}/{org_id}/inventory/samples?q={query}&per_page=75&page={page}',
  ),
  get_payment_methods: route('GET', '{api_root}/{org_id}/payment_methods'),

  deref_route: route('GET', '{api_root}/-/{obj_id}'),
  dataset_short: route('GET', '{api_root}/datasets/{data_id}.json'),
  dataset: route('GET', '{api_root}/datasets/{data_id}.json?key={key}'),
  datasets: route('GET', '{api_root}/{org_id}/{project_id}/runs/{run_id}/data'),
  upload_uri: route('POST', '{api_root}/upload/url_for'),
  upload_datasets: route('POST', '{api_root}/api/datasets'),
  view_data: route('GET', '{api_root}/datasets/{data_id}.embed'),
  view_run: route('GET', '{api_root}/{org_id}/{project_id}/runs/{run_id}.embed'),
  view_instruction: route(
    'GET',
    '{api_root}/{org_id}/{project_id}/runs/{run_id}/instructions/{instruction_id}.embed',
  ),
  view_raw_image: route('GET', '{api_root}/-/{data_id}.raw'),
  get_data_zip: route('GET', '{api_root}/-/{data_id}.zip'),
  monitoring_data: route(
    'GET',
    '{api_root}/sensor_data/{data_type}?instruction_id={instruction_id}',
    { optionalQuery: ['grouping', 'start_time', 'end_time'] },
  ),
} satisfies Record<string, TRoute>)

export type TRouteName = keyof typeof ROUTES

export type TRouteParams = Record<string, string | number | boolean | undefined>

export type TRouteContext = {
  apiRoot: string
  organizationId?: string
}

export type TResolvedRoute = {
  name: TRouteName
  url: string
  method: THttpMethod
  requiresAuth: boolean
}

const PLACEHOLDER = /\{([a-z_]+)\}/g

export function isRouteName(name: string): name is TRouteName {
  return Object.hasOwn(ROUTES, name)
}

/**
 * Expands a named route. Session values fill `{api_root}` and `{org_id}`
 * unless `params` names them; `baseUrl` replaces the API root for routes that
 * accept an execution target.
 */
export function resolveRoute(
  name: string,
  params: TRouteParams,
  context: TRouteContext & { baseUrl?: string },
): TResolvedRoute {
  if (!isRouteName(name)) throw new UnknownRouteError(name)
  const definition: TRoute = ROUTES[name]

  if (context.baseUrl !== undefined && !definition.acceptsBaseUrl) {
    throw new ConfigurationError(`Route ${name} does not accept a base URL override`)
  }

  const apiRoot = normalizeBaseUrl(context.baseUrl ?? context.apiRoot)
  const lookup = (param: string): string | undefined => {
    if (param === 'api_root') return apiRoot || undefined
    const value = params[param] ?? (param === 'org_id' ? context.organizationId : undefined)
    if (value === undefined || value === '') return undefined
    return encodeURIComponent(String(value))
  }

  let url = definition.template.replace(PLACEHOLDER, (_match, param: string) => {
    const value = lookup(param)
    if (value === undefined) throw new MissingParamError(name, param)
    return value
  })

  for (const param of definition.optionalQuery ?? []) {
    const value = lookup(param)
    if (value === undefined) continue
    url += `${url.includes('?') ? '&' : '?'}${param}=${value}`
  }

  return { name, url, method: definition.method, requiresAuth: definition.requiresAuth }
}
