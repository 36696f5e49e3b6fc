import type { Command } from 'commander'
import type { TPackage } from '../../types/api.ts'
import { connect, resolvePath, type TCliContext } from '../context.ts'
import { center, rule, tableRow } from '../format.ts'
import { loadManifest } from '../manifest.ts'

export function registerPackageCommands(program: Command, context: TCliContext): void {
  const { io } = context

  program
    .command('packages')
    .description('List the packages in your organization')
    .action(async () => {
      const connection = await connect(program, context)
      const { yours, theirs } = await connection.packagesByOwner()

      const printSection = (title: string, packages: readonly TPackage[]): void => {
        io.out(center(title, 90))
        io.out(tableRow(['PACKAGE NAME', 'PACKAGE ID', 'LATEST PUBLISHED RELEASE'], 30))
        io.out(rule(90))
        for (const pkg of packages) {
          const name = connection.packageShortName(pkg)
          io.out(`${name.padEnd(30)}|${center(pkg.id, 30)}|${center(pkg.latest_version || '-', 30)}`)
          io.out(rule(90))
        }
      }

      printSection('YOUR PACKAGES:', yours)
      if (theirs.length > 0) printSection('OTHER PACKAGES IN YOUR ORG:', theirs)
    })

  program
    .command('create-package')
    .description('Create a new empty protocol package')
    .argument('<name>', 'package name, without the com.<organization>. prefix')
    .argument('<description>', 'package description')
    .action(async (name: string, description: string) => {
      const connection = await connect(program, context)
      const existing = await connection.packages()
      if (existing.some((pkg) => pkg.name.split('.').pop() === name)) {
        io.out(
          `You already have an existing package with the name "${name}". Please choose a different package name.`,
        )
        return
      }
      const created = await connection.createPackage(name, description)
      io.out(`New package '${name}' created with id ${created.id}`)
      io.out(`View it at ${connection.url(`packages/${created.id}`)}`)
    })

  program
    .command('delete-package')
    .description('Delete an existing protocol package')
    .argument('<package>', 'package name or id')
    .option('-f, --force', 'delete without asking for confirmation')
    .action(async (pkg: string, options: { force?: boolean }) => {
      const connection = await connect(program, context)
      const packageId = await connection.resolvePackage(pkg)
      if (!options.force) {
        const name = connection.packageShortName(await connection.package(packageId))
        const confirmed = await io.confirm(
          `Are you sure you want to permanently delete the package '${name}'? All releases within will be lost.`,
          false,
        )
        if (!confirmed) return
      }
      await connection.deletePackage(packageId)
      io.out('Package deleted.')
    })

  program
    .command('upload-release')
    .description('Upload a release archive to a package and report its validation result')
    .argument('<archive>', 'zip archive of the release')
    .argument('<package>', 'package name or id')
    .action(async (archive: string, pkg: string) => {
      const connection = await connect(program, context)
      io.err(`Uploading ${archive} to ${pkg}`)
      const { packageId, release, status } = await connection.uploadRelease(
        resolvePath(context, archive),
        pkg,
        { validationDelayInMilliseconds: context.releaseValidationDelayInMilliseconds },
      )

      if (status.validation_errors.length > 0) {
        io.out(
          `Package upload to ${connection.packageShortName(await connection.package(packageId))} unsuccessful. The following error(s) was returned:`,
        )
        for (const error of status.validation_errors) io.out(error.message ?? '[Unknown]')
        return
      }
      io.out(`Package uploaded successfully! Release ${release.id}.`)
      io.out(`Visit ${connection.url(`packages/${packageId}`)} to publish.`)
    })

  program
    .command('protocols')
    .description('List the protocols in your organization or in the local manifest')
    .option('--local', 'list the protocols of manifest.json in the working directory')
    .option('--json', 'print the raw protocol list')
    .action(async (options: { local?: boolean; json?: boolean }) => {
      const protocols: Array<{ name: string; display_name?: string | null }> = options.local
        ? (await loadManifest(context.cwd)).protocols
        : await (await connect(program, context)).protocols()

      if (options.json) {
        io.out(JSON.stringify(protocols))
        return
      }
      io.out(center(`Protocols within this ${options.local ? 'manifest' : 'organization'}:`, 60))
      io.out(rule(60))
      for (const protocol of protocols) {
        io.out(protocol.display_name ? `${protocol.name} (${protocol.display_name})` : protocol.name)
        io.out(rule(60))
      }
    })
}
