import { execFile } from 'child_process'
import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { promisify } from 'util'

const run = promisify(execFile)

/**
 * Runs a protocol's `command_string` with the path of a JSON file holding
 * `inputs` appended, and returns what the script printed.
 */
export async function runProtocolScript(
  command: string,
  inputs: unknown,
  options: { cwd: string; extraArgs?: readonly string[] },
): Promise<string> {
  const directory = await fs.mkdtemp(join(tmpdir(), 'transcriptic-'))
  const inputsPath = join(directory, 'inputs.json')
  try {
    await fs.writeFile(inputsPath, JSON.stringify(inputs), 'utf8')
    const args = [inputsPath, ...(options.extraArgs ?? [])].map(shellQuote).join(' ')
    const { stdout } = await run('bash', ['-c', `${command} ${args}`], {
      cwd: options.cwd,
      maxBuffer: 64 * 1024 * 1024,
    })
    return stdout
  } finally {
    await fs.rm(directory, { recursive: true, force: true })
  }
}

/** Runs a protocol's `command_string` with the given arguments, output passed through. */
export async function runCompileScript(
  command: string,
  args: readonly string[],
  options: { cwd: string },
): Promise<string> {
  const { stdout } = await run('bash', ['-c', [command, ...args.map(shellQuote)].join(' ')], {
    cwd: options.cwd,
    maxBuffer: 64 * 1024 * 1024,
  })
  return stdout
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}
