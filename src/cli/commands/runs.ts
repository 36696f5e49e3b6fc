import { promises as fs } from 'fs'
import type { Command } from 'commander'
import type { Connection } from '../../client/connection.ts'
import { AnalysisError, ConfigurationError } from '../../core/errors.ts'
import { isRecord } from '../../core/utils.ts'
import { connect, readJsonInput, resolvePath, type TCliContext } from '../context.ts'
import { analysisLines, priceLines } from '../format.ts'
import { findManifestProtocol, loadManifest } from '../manifest.ts'
import { runProtocolScript } from '../scripts.ts'

type TSubmitOptions = {
  project: string
  title?: string
  test?: boolean
  payment?: string
}

type TLaunchCommandOptions = {
  project?: string
  params?: string
  package?: string
  local?: boolean
  saveInput?: string
  acceptQuote?: boolean
  payment?: string
  test?: boolean
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']

/** Default run title, e.g. `MyProtocol_Oct_18_2026` (UTC). */
export function defaultRunTitle(protocolName: string, date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0')
  return `${protocolName}_${MONTHS[date.getUTCMonth()]}_${day}_${date.getUTCFullYear()}`
}

async function requireValidPayment(connection: Connection, paymentMethodId?: string): Promise<void> {
  if (paymentMethodId === undefined) return
  if (!(await connection.isValidPaymentMethod(paymentMethodId))) {
    throw new ConfigurationError(
      'Payment method is invalid. Please specify a payment method from `transcriptic payments` or omit --payment to use the default payment method.',
    )
  }
}

export function registerRunCommands(program: Command, context: TCliContext): void {
  const { io } = context

  program
    .command('analyze')
    .description('Analyze a block of Autoprotocol JSON')
    .argument('[file]', 'Autoprotocol file, or - for standard input', '-')
    .option('--test', 'analyze this run in test mode')
    .action(async (file: string, options: { test?: boolean }) => {
      const connection = await connect(program, context)
      const protocol = await readJsonInput(context, file, 'Autoprotocol')
      const analysis = await connection.analyzeRun(protocol, { testMode: options.test })
      io.out('✓ Protocol analyzed')
      for (const line of analysisLines(analysis)) io.out(line)
    })

  program
    .command('submit')
    .description('Submit your run to the project specified')
    .argument('[file]', 'Autoprotocol file, or - for standard input', '-')
    .requiredOption('-p, --project <project>', 'project name or id to submit the run to')
    .option('-t, --title <title>', 'title of your run')
    .option('--test', 'submit this run in test mode')
    .option('--payment <id>', 'payment method id from `transcriptic payments`')
    .action(async (file: string, options: TSubmitOptions) => {
      const connection = await connect(program, context)
      await requireValidPayment(connection, options.payment)
      const protocol = await readJsonInput(context, file, 'Autoprotocol')
      const projectId = await connection.resolveProject(options.project)
      const run = await connection.submitRun(protocol, {
        projectId,
        title: options.title,
        testMode: options.test,
        paymentMethodId: options.payment,
      })
      io.out(`Run created: ${connection.url(`${projectId}/runs/${run.id}`)}`)
    })

  program
    .command('launch')
    .description('Configure and launch a protocol from your organization or the local manifest')
    .argument('<protocol>', 'protocol name')
    .option('-p, --project <project>', 'project name or id')
    .option('--params <file>', 'JSON file of launch parameters; without it inputs are chosen in the web app')
    .option('--package <package>', 'package name or id the protocol belongs to')
    .option('--local', 'generate the Autoprotocol locally from manifest.json')
    .option('--save-input <file>', 'save the inputs chosen in the web app to a file')
    .option('--accept-quote', 'launch without showing the quote first')
    .option('--payment <id>', 'payment method id from `transcriptic payments`')
    .option('--test', 'launch in test mode')
    .action(async (protocolName: string, options: TLaunchCommandOptions) => {
      const connection = await connect(program, context)
      await requireValidPayment(connection, options.payment)

      const requireProject = async (reason: string): Promise<string> => {
        if (!options.project) throw new ConfigurationError(reason)
        return await connection.resolveProject(options.project)
      }

      let protocol: Record<string, unknown>
      let protocolId = ''
      let command = ''
      if (options.local) {
        const local = findManifestProtocol(await loadManifest(context.cwd), protocolName)
        protocol = local
        command = local.command_string
      } else {
        io.err(`Searching for ${protocolName}...`)
        const packageId = options.package ? await connection.resolvePackage(options.package) : undefined
        const found = await connection.findProtocol(protocolName, packageId)
        io.err(found.matches > 1 ? 'More than one match found. Using the first match.' : 'Protocol found.')
        protocol = found.protocol
        protocolId = found.protocol.id
      }

      let parameters: Record<string, unknown>
      let resolvedInputs: unknown
      if (options.params) {
        parameters = await readJsonInput(context, options.params, 'parameters file')
      } else {
        const projectId = await requireProject(
          'Project field is required if parameters file is not specified.',
        )
        const created = await connection.createQuickLaunch(projectId, protocol)
        const url = connection.route('get_quick_launch', {
          project_id: projectId,
          quick_launch_id: created.id,
        })
        io.err(`Open ${url} to select the protocol inputs. Waiting for them to be saved...`)
        const quickLaunch = await connection.waitForQuickLaunchInputs(projectId, created, {
          intervalInMilliseconds: context.launchPollIntervalInMilliseconds,
        })
        parameters = { parameters: quickLaunch.raw_inputs }
        resolvedInputs = quickLaunch.inputs
        if (options.saveInput) {
          await fs.writeFile(
            resolvePath(context, options.saveInput),
            JSON.stringify(parameters, null, 2),
            'utf8',
          )
        }
      }

      if (options.local) {
        io.err('Generating Autoprotocol...')
        if (resolvedInputs === undefined) {
          const projectId = await requireProject('Project field is required to resolve local inputs.')
          const inputs = isRecord(parameters.parameters) ? parameters.parameters : {}
          const created = await connection.createQuickLaunch(projectId, protocol)
          resolvedInputs = (await connection.resolveQuickLaunchInputs(projectId, created.id, inputs)).inputs
        }
        io.out(await runProtocolScript(command, resolvedInputs, { cwd: context.cwd }))
        return
      }

      const launched = await connection.launchProtocol(protocolId, parameters, { testMode: options.test })
      const launchRequest = await connection.waitForLaunchRequest(protocolId, launched, {
        intervalInMilliseconds: context.launchPollIntervalInMilliseconds,
      })
      if (launchRequest.generation_errors.length > 0) {
        throw new AnalysisError(
          launchRequest.generation_errors.map((error) => error.message),
          'generating protocol',
        )
      }

      if (!options.acceptQuote) {
        io.out('Cost Breakdown')
        const analysis = await connection.analyzeLaunchRequest(launchRequest.id, {
          testMode: options.test,
        })
        for (const line of priceLines(analysis)) io.out(line)
        if (!(await io.confirm('Would you like to continue with launching the protocol?', false))) {
          return
        }
      }

      const projectId = await requireProject('Project field is required for run submission.')
      const run = await connection.submitLaunchRequest(launchRequest.id, {
        projectId,
        protocolId,
        title: defaultRunTitle(protocolName, context.now?.() ?? new Date()),
        testMode: options.test,
        paymentMethodId: options.payment,
      })
      io.out(`Run created: ${connection.url(`${projectId}/runs/${run.id}`)}`)
    })

  program
    .command('exec')
    .description('Send Autoprotocol straight to an execution target')
    .argument('[file]', 'Autoprotocol file, or - for standard input', '-')
    .requiredOption('-a, --api <url>', 'base URL of the execution target')
    .option('-d, --device-set <file>', 'JSON file describing the device set')
    .action(async (file: string, options: { api: string; deviceSet?: string }) => {
      const connection = await connect(program, context)
      const protocol = await readJsonInput(context, file, 'Autoprotocol')
      const deviceSet = options.deviceSet
        ? await readJsonInput(context, options.deviceSet, 'device set')
        : undefined
      const result = await connection.executeProtocol(protocol, { baseUrl: options.api, deviceSet })
      if (result.success === false) {
        const message = typeof result.message === 'string' ? result.message : JSON.stringify(result)
        throw new AnalysisError([message], 'executing protocol')
      }
      io.out(`Success. View ${options.api} to see the scheduling outcome.`)
    })
}
