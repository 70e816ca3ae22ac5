import { Actor, Project, Task } from '../../types';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { ForbiddenError, NotFoundError } from '../../domain/common/Errors';

/**
 * Ownership checks shared by every task and project operation.
 * A caller may act on a task when it owns the task's project or created the task.
 */
export class AccessGuard {
  constructor(private projectRepo: IProjectRepository) {}

  /**
   * @returns The task's project
   * @throws {NotFoundError} if the owning project no longer exists
   * @throws {ForbiddenError} if the actor is neither project owner nor task creator
   */
  async assertTaskAccess(actor: Actor, task: Task): Promise<Project> {
    const project = await this.projectRepo.findById(task.projectId);
    if (!project) {
      throw new NotFoundError('Project', task.projectId);
    }
    if (project.ownerId !== actor.id && task.creatorId !== actor.id) {
      throw new ForbiddenError(`No access to task '${task.id}'`);
    }
    return project;
  }

  assertProjectAccess(actor: Actor, project: Project): void {
    if (project.ownerId !== actor.id) {
      throw new ForbiddenError(`No access to project '${project.name}'`);
    }
  }

  /**
   * Error for a project lookup that matched nothing. Lists only the
   * projects the actor owns, never anyone else's.
   */
  async unknownProject(actor: Actor, identifier: string): Promise<NotFoundError> {
    const owned = await this.projectRepo.findAll(actor.id);
    return new NotFoundError(`Project '${identifier}'`, undefined, {
      available_projects: owned.map(p => ({ id: p.id, name: p.name }))
    });
  }
}
