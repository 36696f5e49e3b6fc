import { promises as fs } from 'fs'
import { isAbsolute, join } from 'path'
import type { Command } from 'commander'
import { Connection } from '../client/connection.ts'
import type { TConfigInput } from '../core/config.ts'
import { ConfigurationError } from '../core/errors.ts'
import { isRecord } from '../core/utils.ts'
import type { TCliIo } from './io.ts'

/** What the program needs from its host; tests pass fakes for all of it. */
export type TCliContext = {
  io: TCliIo
  env: NodeJS.ProcessEnv
  cwd: string
  fetchImplementation?: typeof fetch
  releaseValidationDelayInMilliseconds?: number
  launchPollIntervalInMilliseconds?: number
  /** Used for default run titles. */
  now?: () => Date
}

export type TGlobalFlags = {
  apiRoot?: string
  organization?: string
  email?: string
  token?: string
  rsaKey?: string
  config?: string
  verbose?: boolean
}

export function configInputFromFlags(flags: TGlobalFlags): TConfigInput {
  return {
    apiRoot: flags.apiRoot,
    organizationId: flags.organization,
    email: flags.email,
    token: flags.token,
    rsaKey: flags.rsaKey,
    configPath: flags.config,
  }
}

/** Opens a connection from the program's global flags, environment and config file. */
export async function connect(program: Command, context: TCliContext): Promise<Connection> {
  const flags = program.opts<TGlobalFlags>()
  return await Connection.fromConfig({
    flags: configInputFromFlags(flags),
    env: context.env,
    fetchImplementation: context.fetchImplementation,
    verbose: flags.verbose,
  })
}

export function resolvePath(context: TCliContext, path: string): string {
  return isAbsolute(path) ? path : join(context.cwd, path)
}

/** Reads a file relative to the working directory, or standard input for `-`. */
export async function readInput(context: TCliContext, file: string): Promise<string> {
  if (file === '-') return await context.io.readStdin()
  try {
    return await fs.readFile(resolvePath(context, file), 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Could not open file ${file}: ${reason}`)
  }
}

export async function readJsonInput(
  context: TCliContext,
  file: string,
  what: string,
): Promise<Record<string, unknown>> {
  const text = await readInput(context, file)
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch {
    throw new ConfigurationError(`The ${what} you're trying to read is not valid JSON.`)
  }
  if (!isRecord(value)) throw new ConfigurationError(`The ${what} must be a JSON object.`)
  return value
}
