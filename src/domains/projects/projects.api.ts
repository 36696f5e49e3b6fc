import { z } from 'zod'
import type { ApiClient } from '../../core/api-client.ts'
import {
  JsonObjectSchema,
  ProjectListSchema,
  RunSchema,
  type TJsonObject,
  type TProject,
  type TRun,
} from '../../types/api.ts'

export type TProjectsApiOptions = {
  client: ApiClient
}

const CreatedProjectSchema = z.object({ id: z.string() }).passthrough()

/** Thin HTTP client over the project endpoints of the session organization. */
export interface TProjectsApi {
  listProjects(signal?: AbortSignal): Promise<TProject[]>
  getProject(projectId: string, signal?: AbortSignal): Promise<TJsonObject>
  listRuns(projectId: string, signal?: AbortSignal): Promise<TRun[]>
  createProject(title: string, signal?: AbortSignal): Promise<z.infer<typeof CreatedProjectSchema>>
  deleteProject(projectId: string, signal?: AbortSignal): Promise<void>
  archiveProject(projectId: string, signal?: AbortSignal): Promise<void>
}

export class ProjectsApi implements TProjectsApi {
  private readonly client: ApiClient

  constructor(options: TProjectsApiOptions) {
    this.client = options.client
  }

  public async listProjects(signal?: AbortSignal): Promise<TProject[]> {
    const response = await this.client.request(ProjectListSchema, 'get_projects', {}, { signal })
    return response.projects
  }

  public async getProject(projectId: string, signal?: AbortSignal): Promise<TJsonObject> {
    return await this.client.request(
      JsonObjectSchema,
      'get_project',
      { project_id: projectId },
      { signal },
    )
  }

  public async listRuns(projectId: string, signal?: AbortSignal): Promise<TRun[]> {
    return await this.client.request(
      z.array(RunSchema),
      'get_project_runs',
      { project_id: projectId },
      { signal },
    )
  }

  public async createProject(
    title: string,
    signal?: AbortSignal,
  ): Promise<z.infer<typeof CreatedProjectSchema>> {
    return await this.client.request(CreatedProjectSchema, 'create_project', {}, {
      json: { name: title },
      signal,
    })
  }

  public async deleteProject(projectId: string, signal?: AbortSignal): Promise<void> {
    await this.client.send('delete_project', { project_id: projectId }, { signal })
  }

  public async archiveProject(projectId: string, signal?: AbortSignal): Promise<void> {
    await this.client.send('archive_project', { project_id: projectId }, {
      json: { project: { archived: true } },
      signal,
    })
  }
}
