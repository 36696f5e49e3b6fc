import { promises as fs } from 'fs'
import { join } from 'path'
import { z } from 'zod'
import { ConfigurationError, NotFoundError } from '../core/errors.ts'

export const MANIFEST_FILE = 'manifest.json'

export const ManifestProtocolSchema = z
  .object({
    name: z.string().min(1),
    display_name: z.string().optional(),
    version: z.string().optional(),
    description: z.string().optional(),
    command_string: z.string().min(1),
    inputs: z.record(z.unknown()),
    preview: z
      .object({ refs: z.record(z.unknown()), parameters: z.record(z.unknown()) })
      .passthrough()
      .optional(),
  })
  .passthrough()

export const ManifestSchema = z
  .object({
    format: z.string().optional(),
    license: z.string().optional(),
    protocols: z.array(ManifestProtocolSchema).min(1, 'manifest has no protocols'),
  })
  .passthrough()

export type TManifest = z.infer<typeof ManifestSchema>
export type TManifestProtocol = z.infer<typeof ManifestProtocolSchema>

/** Starting manifest written by `init`. */
export const MANIFEST_TEMPLATE: TManifest = {
  format: 'python',
  license: 'MIT',
  protocols: [
    {
      name: 'SampleProtocol',
      version: '0.0.1',
      display_name: 'Sample Protocol',
      description: 'This is a protocol.',
      command_string: 'python sample_protocol.py',
      inputs: {},
      preview: { refs: {}, parameters: {} },
    },
  ],
}

export async function readJsonFile(path: string): Promise<unknown> {
  let text: string
  try {
    text = await fs.readFile(path, 'utf8')
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Could not read ${path}: ${reason}`)
  }
  try {
    return JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Invalid JSON in ${path}: ${reason}`)
  }
}

export function parseManifest(raw: unknown, source = MANIFEST_FILE): TManifest {
  const parsed = ManifestSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    )
    throw new ConfigurationError(`Formatting errors in ${source}:\n${issues.join('\n')}`)
  }
  return parsed.data
}

export async function loadManifest(directory: string): Promise<TManifest> {
  const path = join(directory, MANIFEST_FILE)
  return parseManifest(await readJsonFile(path), path)
}

export function findManifestProtocol(manifest: TManifest, name: string): TManifestProtocol {
  const protocol = manifest.protocols.find((candidate) => candidate.name === name)
  if (!protocol) {
    throw new NotFoundError(
      `The protocol name '${name}' does not match any protocols in ${MANIFEST_FILE}.`,
    )
  }
  return protocol
}
