import { describe, expect, it, vi } from 'vitest'
import { AmbiguousProjectError, NotFoundError } from '../../../../src/core/errors.ts'
import type { TProjectsApi } from '../../../../src/domains/projects/projects.api.ts'
import { ProjectsFeature } from '../../../../src/domains/projects/projects.feature.ts'
import type { TProject } from '../../../../src/types/api.ts'
import { makeProject } from '../../../helpers/factories.ts'

function createProjectsApi(projects: TProject[]): TProjectsApi {
  return {
    listProjects: vi.fn(async () => projects),
    getProject: vi.fn(),
    listRuns: vi.fn(),
    createProject: vi.fn(),
    deleteProject: vi.fn(),
    archiveProject: vi.fn(),
  }
}

describe('ProjectsFeature', () => {
  describe('resolveProjectId', () => {
    it('returns an id unchanged when a project has it', async () => {
      const project = makeProject({ id: 'p1abc', name: 'Growth' })
      const feature = new ProjectsFeature({ api: createProjectsApi([project]) })

      expect(await feature.resolveProjectId('p1abc')).toBe('p1abc')
    })

    it('maps a unique name to its id', async () => {
      const feature = new ProjectsFeature({
        api: createProjectsApi([
          makeProject({ id: 'p1', name: 'Growth' }),
          makeProject({ id: 'p2', name: 'Cloning' }),
        ]),
      })

      expect(await feature.resolveProjectId('Cloning')).toBe('p2')
    })

    it('prefers an id match over a project named like that id', async () => {
      const feature = new ProjectsFeature({
        api: createProjectsApi([
          makeProject({ id: 'p1', name: 'p2' }),
          makeProject({ id: 'p2', name: 'Other' }),
        ]),
      })

      expect(await feature.resolveProjectId('p2')).toBe('p2')
    })

    it('refuses to guess between projects sharing a name', async () => {
      const feature = new ProjectsFeature({
        api: createProjectsApi([
          makeProject({ id: 'p1', name: 'Growth' }),
          makeProject({ id: 'p2', name: 'Growth' }),
        ]),
      })

      const error = await feature.resolveProjectId('Growth').catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(AmbiguousProjectError)
      expect(error).toMatchObject({ candidateIds: ['p1', 'p2'] })
    })

    it('throws NotFoundError for an unknown project', async () => {
      const feature = new ProjectsFeature({ api: createProjectsApi([]) })

      await expect(feature.resolveProjectId('Missing')).rejects.toThrow(
        new NotFoundError("The project 'Missing' was not found in your organization."),
      )
    })
  })

  describe('resolveProjectName', () => {
    it('returns the name for an id and the name itself for a name', async () => {
      const feature = new ProjectsFeature({
        api: createProjectsApi([makeProject({ id: 'p1', name: 'Growth' })]),
      })

      expect(await feature.resolveProjectName('p1')).toBe('Growth')
      expect(await feature.resolveProjectName('Growth')).toBe('Growth')
      await expect(feature.resolveProjectName('p9')).rejects.toThrow(NotFoundError)
    })
  })
})
