import type { Command } from 'commander'
import { ConfigurationError } from '../../core/errors.ts'
import type { TOrganization } from '../../types/api.ts'
import { connect, type TCliContext, type TGlobalFlags } from '../context.ts'
import type { TCliIo } from '../io.ts'

const MAXIMUM_PROMPTS = 3

export function registerSessionCommands(program: Command, context: TCliContext): void {
  const { io } = context

  program
    .command('login')
    .description('Authenticate to your account and store the session in the config file')
    .action(async () => {
      const flags = program.opts<TGlobalFlags>()
      const connection = await connect(program, context)
      const email = flags.email ?? (await io.prompt('Email: '))
      const password = await io.prompt('Password: ', { hidden: true })

      const session = await connection.login(email, password, {
        organizationId: flags.organization,
        chooseOrganization: (organizations) => promptOrganization(io, organizations),
      })
      io.out(`Logged in as ${session.email ?? email} (${session.organizationId ?? ''})`)
    })

  program
    .command('select-org')
    .description('Switch to another organization')
    .argument('[organization]', 'organization subdomain')
    .action(async (organization: string | undefined) => {
      const connection = await connect(program, context)
      const selected =
        organization ?? (await promptOrganization(io, await connection.organizations()))
      await connection.selectOrganization(selected)
      io.out(`Logged in with organization: ${selected}`)
    })
}

export async function promptOrganization(
  io: TCliIo,
  organizations: readonly TOrganization[],
): Promise<string> {
  if (organizations.length === 0) {
    throw new ConfigurationError("You don't appear to belong to any organizations.")
  }
  if (organizations.length === 1) return organizations[0].subdomain

  io.out('You belong to these organizations:')
  organizations.forEach((organization, index) => {
    io.out(`  ${index + 1}. ${organization.name} (${organization.subdomain})`)
  })

  for (let attempt = 0; attempt < MAXIMUM_PROMPTS; attempt++) {
    const answer = await io.prompt(`Which organization would you like to use? [1-${organizations.length}]: `)
    const choice = Number(answer)
    if (Number.isInteger(choice) && choice >= 1 && choice <= organizations.length) {
      return organizations[choice - 1].subdomain
    }
    io.err('Please enter one of the numbers listed.')
  }
  throw new ConfigurationError('No organization selected.')
}
