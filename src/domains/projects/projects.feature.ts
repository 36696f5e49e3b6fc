import { AmbiguousProjectError, NotFoundError } from '../../core/errors.ts'
import type { TProjectsApi } from './projects.api.ts'

type TProjectsFeatureOptions = {
  api: TProjectsApi
}

/** Maps the project names users type to project ids. */
export class ProjectsFeature {
  private api: TProjectsApi

  constructor(options: TProjectsFeatureOptions) {
    this.api = options.api
  }

  /**
   * Returns the id of the project addressed by id or name. An id match wins;
   * a name shared by several projects is never guessed.
   */
  public async resolveProjectId(nameOrId: string, signal?: AbortSignal): Promise<string> {
    const projects = await this.api.listProjects(signal)
    if (projects.some((project) => project.id === nameOrId)) return nameOrId

    const matches = projects.filter((project) => project.name === nameOrId)
    if (matches.length === 0) {
      throw new NotFoundError(`The project '${nameOrId}' was not found in your organization.`)
    }
    if (matches.length > 1) {
      throw new AmbiguousProjectError(nameOrId, matches.map((project) => project.id))
    }
    return matches[0].id
  }

  /** Returns the display name of the project addressed by id or name. */
  public async resolveProjectName(nameOrId: string, signal?: AbortSignal): Promise<string> {
    const projects = await this.api.listProjects(signal)
    const byId = projects.find((project) => project.id === nameOrId)
    if (byId) return byId.name
    if (projects.some((project) => project.name === nameOrId)) return nameOrId
    throw new NotFoundError(`The project '${nameOrId}' was not found in your organization.`)
  }
}
