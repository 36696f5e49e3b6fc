import { promises as fs } from 'fs'
import { join } from 'path'
import type { Command } from 'commander'
import { ConfigurationError } from '../../core/errors.ts'
import { isRecord } from '../../core/utils.ts'
import { translateProtocol } from '../../domains/english/english.ts'
import { connect, readJsonInput, resolvePath, type TCliContext } from '../context.ts'
import {
  findManifestProtocol,
  loadManifest,
  MANIFEST_FILE,
  MANIFEST_TEMPLATE,
  parseManifest,
  readJsonFile,
} from '../manifest.ts'
import { runCompileScript, runProtocolScript } from '../scripts.ts'

async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path)
    return true
  } catch {
    return false
  }
}

export function registerLocalCommands(program: Command, context: TCliContext): void {
  const { io } = context

  program
    .command('init')
    .description('Initialize a directory with a manifest.json file')
    .argument('[path]', 'directory to initialize', '.')
    .action(async (path: string) => {
      const directory = resolvePath(context, path)
      await fs.mkdir(directory, { recursive: true })
      const manifestPath = join(directory, MANIFEST_FILE)
      if (await exists(manifestPath)) {
        const overwrite = await io.confirm(
          'This directory already contains a manifest.json file, would you like to overwrite it with an empty one?',
          false,
        )
        if (!overwrite) return
      }
      io.out('Creating empty manifest.json...')
      await fs.writeFile(manifestPath, JSON.stringify(MANIFEST_TEMPLATE, null, 2), 'utf8')
      io.out('manifest.json created')
    })

  program
    .command('preview')
    .description("Preview the Autoprotocol output of a protocol in the working directory's manifest")
    .argument('<protocol>', 'protocol name in manifest.json')
    .option('--view', 'also print a link to the rendered protocol')
    .option('--dye-test', 'run the protocol script with --dye_test')
    .action(async (name: string, options: { view?: boolean; dyeTest?: boolean }) => {
      const protocol = findManifestProtocol(await loadManifest(context.cwd), name)
      if (!protocol.preview) {
        throw new ConfigurationError(
          `The ${MANIFEST_FILE} you're trying to preview doesn't contain a "preview" section`,
        )
      }

      const output = await runProtocolScript(protocol.command_string, protocol.preview, {
        cwd: context.cwd,
        extraArgs: options.dyeTest ? ['--dye_test'] : [],
      })
      io.out(output.trimEnd())

      if (options.view) {
        let generated: unknown
        try {
          generated = JSON.parse(output)
        } catch {
          throw new ConfigurationError('The protocol script did not print valid Autoprotocol JSON.')
        }
        if (!isRecord(generated)) {
          throw new ConfigurationError('The protocol script did not print an Autoprotocol object.')
        }
        const connection = await connect(program, context)
        const url = await connection.previewProtocol(generated)
        io.out(`View your protocol's raw JSON above or see the instructions rendered at the following link:\n${url}`)
      }
    })

  program
    .command('summarize')
    .description('Summarize Autoprotocol as a list of English steps')
    .argument('[file]', 'Autoprotocol file, or - for standard input', '-')
    .option('--html', 'print a link to the rendered protocol instead')
    .action(async (file: string, options: { html?: boolean }) => {
      const protocol = await readJsonInput(context, file, 'Autoprotocol')
      if (options.html) {
        const connection = await connect(program, context)
        io.out(`View your protocol here ${await connection.previewProtocol(protocol)}`)
        return
      }
      translateProtocol(protocol).forEach((sentence, index) => io.out(`${index + 1}. ${sentence}`))
    })

  program
    .command('compile')
    .description('Run a protocol script with the given arguments, without submitting or analyzing')
    .argument('<protocol>', 'protocol name in manifest.json')
    .argument('[args...]', 'arguments passed to the protocol script')
    .action(async (name: string, args: string[]) => {
      const protocol = findManifestProtocol(await loadManifest(context.cwd), name)
      const output = await runCompileScript(protocol.command_string, args, { cwd: context.cwd })
      io.out(output.trimEnd())
    })

  program
    .command('format')
    .description('Check the format of a manifest.json file')
    .argument('[manifest]', 'manifest file', MANIFEST_FILE)
    .action(async (manifest: string) => {
      const path = resolvePath(context, manifest)
      parseManifest(await readJsonFile(path), manifest)
      io.out('No manifest formatting errors found.')
    })
}
