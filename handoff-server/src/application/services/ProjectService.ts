import { Actor, Project, CreateProjectPayload } from '../../types';
import { IProjectRepository } from '../../domain/repositories/IProjectRepository';
import { IEventBus } from '../../domain/events/IEventBus';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError, NotFoundError } from '../../domain/common/Errors';
import { AccessGuard } from './AccessGuard';

/**
 * Application service for project operations.
 * Coordinates repository access, validation, and event emission.
 */
export class ProjectService {
  constructor(
    private projectRepo: IProjectRepository,
    private guard: AccessGuard,
    private eventBus: IEventBus,
    private logger: ILogger
  ) {}

  /**
   * Create a new project owned by the calling actor.
   */
  async createProject(actor: Actor, input: CreateProjectPayload): Promise<Project> {
    if (!input.name || input.name.trim() === '') {
      throw new ValidationError('Project name is required');
    }

    const project = await this.projectRepo.create({
      name: input.name.trim(),
      description: input.description || '',
      ownerId: actor.id
    });

    this.logger.info('Project created', { projectId: project.id, ownerId: actor.id });
    await this.eventBus.emit('project:created', project);

    return project;
  }

  async getProject(actor: Actor, id: string): Promise<Project> {
    const project = await this.projectRepo.findById(id);
    if (!project) {
      throw new NotFoundError('Project', id);
    }
    this.guard.assertProjectAccess(actor, project);
    return project;
  }

  /**
   * Look up a project by its unique name.
   */
  async getProjectByName(actor: Actor, name: string): Promise<Project> {
    const project = await this.projectRepo.findByName(name);
    if (!project) {
      throw await this.guard.unknownProject(actor, name);
    }
    this.guard.assertProjectAccess(actor, project);
    return project;
  }

  /**
   * List the projects the actor owns.
   */
  async listProjects(actor: Actor): Promise<Project[]> {
    return this.projectRepo.findAll(actor.id);
  }

  /**
   * Record activity on a project. Not fatal to the caller's operation.
   */
  async touchActivity(projectId: string, at: number): Promise<void> {
    try {
      await this.projectRepo.update(projectId, { lastActivityAt: at });
    } catch (err) {
      this.logger.warn('Failed to record project activity', {
        projectId,
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }
}
