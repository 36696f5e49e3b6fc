import { basename } from 'path'
import type { Command } from 'commander'
import { describePaymentMethod } from '../../domains/catalog/catalog.feature.ts'
import { connect, resolvePath, type TCliContext } from '../context.ts'
import { center, rule, tableRow } from '../format.ts'

type TUploadDatasetCommandOptions = {
  title?: string
  tool: string
  toolVersion: string
}

export function registerCatalogCommands(program: Command, context: TCliContext): void {
  const { io } = context

  program
    .command('resources')
    .description('Search the catalog of provisionable resources')
    .argument('[query]', 'search text', '*')
    .action(async (query: string) => {
      const connection = await connect(program, context)
      const resources = await connection.resources(query)
      if (resources.results.length === 0) {
        io.out(`No results for '${query}'.`)
        return
      }
      const usable = await connection.usableResources(query)
      if (usable.length === 0) {
        io.out(`No usable resource for '${query}'.`)
        return
      }

      io.out(`Results for '${query}':`)
      io.out(tableRow(['Resource Name', 'Vendor', 'Resource ID'], 40))
      io.out(rule(120))
      for (const resource of usable) {
        io.out(tableRow([resource.name, resource.vendor, resource.id], 40))
      }
      io.out(rule(120))
    })

  program
    .command('payments')
    .description('List the payment methods of your organization')
    .action(async () => {
      const connection = await connect(program, context)
      const methods = await connection.paymentMethods()
      if (methods.length === 0) {
        io.out('No payment methods found.')
        return
      }
      const row = (method: string, expiry: string, id: string): string =>
        `${center(method, 50)}|${center(expiry, 20)}|${center(id, 20)}`
      io.out(row('Method', 'Expiry', 'Id'))
      io.out(rule(92))
      for (const method of methods) {
        io.out(row(describePaymentMethod(method), method.expiry ?? '', method.id))
      }
    })

  program
    .command('upload-dataset')
    .description('Upload a file as an analysis dataset of a run')
    .argument('<file>', 'file to upload')
    .argument('<run>', 'run id')
    .option('-t, --title <title>', 'dataset title; defaults to the file name')
    .requiredOption('--tool <name>', 'name of the analysis tool that produced the file')
    .requiredOption('--tool-version <version>', 'version of the analysis tool')
    .action(async (file: string, runId: string, options: TUploadDatasetCommandOptions) => {
      const connection = await connect(program, context)
      const uploaded = await connection.uploadDatasetFromFile(resolvePath(context, file), {
        runId,
        title: options.title ?? basename(file),
        analysisTool: options.tool,
        analysisToolVersion: options.toolVersion,
      })
      const run = await connection.run(runId)
      const datasets = connection.route('datasets', {
        project_id: run.data.attributes.project_id,
        run_id: runId,
      })
      io.out(`Dataset uploaded to ${datasets}/analysis/${uploaded.data.id}`)
    })
}
