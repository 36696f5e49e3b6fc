import { promises as fs } from 'fs'
import { homedir } from 'os'
import { dirname, join, resolve } from 'path'
import { z } from 'zod'
import {
  resolveCredentials,
  type TCredentialInput,
  type TCredentialOrigin,
} from '../providers/auth/credentials.ts'
import { ConfigurationError } from './errors.ts'
import type { TCredential } from './types.ts'

export const DEFAULT_API_ROOT = 'https://secure.transcriptic.com'
export const DEFAULT_CONFIG_PATH = join(homedir(), '.transcriptic')

export const ENV = {
  apiRoot: 'TRANSCRIPTIC_API_ROOT',
  organizationId: 'TRANSCRIPTIC_ORGANIZATION',
  email: 'TRANSCRIPTIC_EMAIL',
  token: 'TRANSCRIPTIC_TOKEN',
  rsaKey: 'TRANSCRIPTIC_RSA_KEY',
  configPath: 'TRANSCRIPTIC_CONFIG',
} as const

// Unknown keys survive a load/save cycle so newer clients' settings are kept.
export const ConfigFileSchema = z
  .object({
    email: z.string().nullish(),
    token: z.string().nullish(),
    organization_id: z.string().nullish(),
    api_root: z.string().url('api_root must be a URL').nullish(),
    rsa_key: z.string().nullish(),
    analytics: z.boolean().nullish(),
    user_id: z.string().nullish(),
    feature_groups: z.array(z.string()).nullish(),
  })
  .passthrough()

export type TConfigFile = z.infer<typeof ConfigFileSchema>

export type TConfigInput = TCredentialInput & {
  apiRoot?: string
  organizationId?: string
  configPath?: string
}

export type TSessionConfig = {
  apiRoot: string
  organizationId?: string
  userId?: string
  email?: string
  credential?: TCredential
  credentialOrigin?: TCredentialOrigin
  featureGroups: string[]
  analytics: boolean
  configPath: string
}

export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return resolve(path)
}

/** Reads the config file. A missing file yields an empty config. */
export async function readConfigFile(path: string): Promise<TConfigFile> {
  let text: string
  try {
    text = await fs.readFile(expandHome(path), 'utf8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return {}
    throw error
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`)
  }

  const parsed = ConfigFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid config file ${path}: ${issues.join('; ')}`)
  }
  return parsed.data
}

/**
 * Merges `patch` into the stored config and writes the complete result. The
 * content goes to a sibling temp file that is closed before being renamed over
 * the original, so readers never see a partial file.
 */
export async function writeConfigFile(path: string, patch: Partial<TConfigFile>): Promise<TConfigFile> {
  const target = expandHome(path)
  const merged: TConfigFile = { ...(await readConfigFile(target)), ...patch }
  const temporary = join(dirname(target), `.${process.pid}.${Date.now()}.tmp`)

  const handle = await fs.open(temporary, 'w', 0o600)
  try {
    await handle.writeFile(`${JSON.stringify(merged, null, 2)}\n`, 'utf8')
  } finally {
    await handle.close()
  }

  try {
    await fs.rename(temporary, target)
  } catch (error) {
    await fs.rm(temporary, { force: true })
    throw error
  }
  return merged
}

export function configInputFromEnv(env: NodeJS.ProcessEnv): TConfigInput {
  return {
    apiRoot: env[ENV.apiRoot] || undefined,
    organizationId: env[ENV.organizationId] || undefined,
    email: env[ENV.email] || undefined,
    token: env[ENV.token] || undefined,
    rsaKey: env[ENV.rsaKey] || undefined,
    configPath: env[ENV.configPath] || undefined,
  }
}

export function configInputFromFile(file: TConfigFile): TConfigInput {
  return {
    apiRoot: file.api_root ?? undefined,
    organizationId: file.organization_id ?? undefined,
    email: file.email ?? undefined,
    token: file.token ?? undefined,
    rsaKey: file.rsa_key ?? undefined,
  }
}

/** Loads a PEM key given inline or as a file path. */
export async function loadPrivateKey(reference: string): Promise<string> {
  if (reference.includes('-----BEGIN')) return reference
  try {
    return await fs.readFile(expandHome(reference), 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Could not read RSA key ${reference}: ${reason}`)
  }
}

export type TLoadSessionConfigOptions = {
  flags?: TConfigInput
  env?: NodeJS.ProcessEnv
}

/**
 * Builds the session config. Each field comes from the flags if set, else the
 * environment, else the config file; the credential is resolved as a unit by
 * the same precedence.
 */
export async function loadSessionConfig(
  options: TLoadSessionConfigOptions = {},
): Promise<TSessionConfig> {
  const flags = options.flags ?? {}
  const env = configInputFromEnv(options.env ?? process.env)
  const configPath = flags.configPath ?? env.configPath ?? DEFAULT_CONFIG_PATH
  const stored = await readConfigFile(configPath)
  const file = configInputFromFile(stored)

  const pick = <K extends keyof TConfigInput>(key: K): TConfigInput[K] =>
    flags[key] ?? env[key] ?? file[key]

  const resolved = resolveCredentials({ flags, env, file })
  let credential = resolved?.credential
  if (credential?.kind === 'signature') {
    credential = { ...credential, privateKey: await loadPrivateKey(credential.privateKey) }
  }

  return {
    apiRoot: pick('apiRoot') ?? DEFAULT_API_ROOT,
    organizationId: pick('organizationId'),
    userId: stored.user_id ?? undefined,
    email: pick('email'),
    credential,
    credentialOrigin: resolved?.origin,
    featureGroups: stored.feature_groups ?? [],
    analytics: stored.analytics ?? true,
    configPath,
  }
}

/**
 * Persists the parts of a session that login and organization selection
 * change. The token is written only when `includeToken` is set, so a token
 * passed by flag or environment never lands in the file by accident.
 */
export async function saveSessionConfig(
  session: TSessionConfig,
  options: { includeToken?: boolean } = {},
): Promise<void> {
  const patch: Partial<TConfigFile> = {
    api_root: session.apiRoot,
    organization_id: session.organizationId ?? null,
    user_id: session.userId ?? null,
    email: session.email ?? null,
    analytics: session.analytics,
    feature_groups: session.featureGroups,
  }
  if (options.includeToken && session.credential?.kind === 'bearer') {
    patch.token = session.credential.token
  }

  await writeConfigFile(session.configPath, patch)
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
