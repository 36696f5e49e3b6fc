import { Command, CommanderError } from 'commander'
import { SDK_VERSION } from '../core/sdk-info.ts'
import { registerCatalogCommands } from './commands/catalog.ts'
import { registerLocalCommands } from './commands/local.ts'
import { registerPackageCommands } from './commands/packages.ts'
import { registerProjectCommands } from './commands/projects.ts'
import { registerRunCommands } from './commands/runs.ts'
import { registerSessionCommands } from './commands/session.ts'
import type { TCliContext } from './context.ts'

export function createProgram(context: TCliContext): Command {
  const program = new Command()

  program
    .name('transcriptic')
    .description('Command-line client for the Transcriptic cloud lab')
    .version(SDK_VERSION)
    .option('--api-root <url>', 'API root URL')
    .option('-o, --organization <subdomain>', 'organization to act in')
    .option('--email <email>', 'account email')
    .option('--token <token>', 'API token')
    .option('--rsa-key <path>', 'PEM private key for signed requests')
    .option('--config <path>', 'config file path (default: ~/.transcriptic)')
    .option('--verbose', 'log every request')
    .showHelpAfterError()
    // Subcommands copy these two settings when they are created below.
    .exitOverride()
    .configureOutput({
      writeOut: (text) => context.io.out(text.trimEnd()),
      writeErr: (text) => context.io.err(text.trimEnd()),
    })

  registerSessionCommands(program, context)
  registerProjectCommands(program, context)
  registerPackageCommands(program, context)
  registerRunCommands(program, context)
  registerCatalogCommands(program, context)
  registerLocalCommands(program, context)

  return program
}

/**
 * Runs the CLI for `argv` (without the node and script entries) and returns
 * the exit code. Errors are printed as `Error: <message>`.
 */
export async function runCli(argv: readonly string[], context: TCliContext): Promise<number> {
  const program = createProgram(context)
  try {
    await program.parseAsync([...argv], { from: 'user' })
    return 0
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version exit with 0; usage errors were already printed.
      return error.exitCode
    }
    context.io.err(`Error: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
}
