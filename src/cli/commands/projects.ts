import type { Command } from 'commander'
import { HTTPError } from '../../core/errors.ts'
import { connect, type TCliContext } from '../context.ts'
import { center, rule, tableRow } from '../format.ts'

type TListOptions = { json?: boolean }

function datePart(timestamp: string | null | undefined): string {
  return timestamp ? timestamp.split('T')[0] : ''
}

export function registerProjectCommands(program: Command, context: TCliContext): void {
  const { io } = context

  program
    .command('projects')
    .description('List the projects in your organization')
    .option('--json', 'print the raw project list')
    .action(async (options: TListOptions) => {
      const connection = await connect(program, context)
      const projects = await connection.projects()
      if (options.json) {
        io.out(JSON.stringify(projects))
        return
      }

      io.out(center('PROJECTS:', 80))
      io.out(tableRow(['PROJECT NAME', 'PROJECT ID'], 40))
      io.out(rule(80))
      for (const project of projects) {
        const name = `${project.name}${project.archived_at ? ' (archived)' : ''}`
        io.out(`${name.padEnd(40)}|${center(project.id, 40)}`)
        io.out(rule(80))
      }
    })

  program
    .command('runs')
    .description('List the runs in a project')
    .argument('<project>', 'project name or id')
    .option('--json', 'print the raw run list')
    .action(async (project: string, options: TListOptions) => {
      const connection = await connect(program, context)
      const projectId = await connection.resolveProject(project)
      const runs = await connection.runs(projectId)
      if (options.json) {
        io.out(
          JSON.stringify(
            runs.map((run) => ({
              title: run.title || '(Untitled)',
              id: run.id,
              completed_at: run.completed_at ?? null,
              created_at: run.created_at ?? null,
              status: run.status ?? null,
            })),
          ),
        )
        return
      }
      if (runs.length === 0) {
        io.out(`Project '${project}' is empty.`)
        return
      }

      io.out(center(`Runs in Project '${await connection.projectName(projectId)}':`, 120))
      io.out(tableRow(['RUN TITLE', 'RUN ID', 'RUN DATE', 'RUN STATUS'], 30))
      io.out(rule(120))
      for (const run of runs) {
        const date = datePart(run.completed_at) || datePart(run.created_at)
        const status = (run.status ?? '').replace(/_/g, ' ')
        io.out(tableRow([run.title || '(Untitled)', run.id, date, status], 30))
        io.out(rule(120))
      }
    })

  program
    .command('create-project')
    .description('Create a new empty project')
    .argument('<name>', 'project name')
    .action(async (name: string) => {
      const connection = await connect(program, context)
      const existing = await connection.projects()
      if (existing.some((project) => project.name === name)) {
        const proceed = await io.confirm(
          `You already have an existing project with the name '${name}'. Are you sure you want to create another one?`,
          false,
        )
        if (!proceed) return
      }
      const created = await connection.createProject(name)
      io.out(`New project '${name}' created with id ${created.id}`)
      io.out(`View it at ${connection.url(created.id)}`)
    })

  program
    .command('delete-project')
    .description('Delete an existing project, or archive it if it holds runs')
    .argument('<project>', 'project name or id')
    .option('-f, --force', 'delete without asking for confirmation')
    .action(async (project: string, options: { force?: boolean }) => {
      const connection = await connect(program, context)
      const projectId = await connection.resolveProject(project)
      if (!options.force) {
        const name = await connection.projectName(projectId)
        if (!(await io.confirm(`Are you sure you want to permanently delete '${name}'?`, false))) {
          return
        }
      }

      try {
        await connection.deleteProject(projectId)
        io.out('Project deleted.')
      } catch (error) {
        if (!(error instanceof HTTPError)) throw error
        const archive = await io.confirm(
          'Could not delete project. This may be because it contains runs. Try archiving it instead?',
          false,
        )
        if (!archive) return
        await connection.archiveProject(projectId)
        io.out('Project archived.')
      }
    })
}
