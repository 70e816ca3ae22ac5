import { Project } from '../../types';
import {
  IProjectRepository,
  CreateProjectInput,
  UpdateProjectInput
} from '../../domain/repositories/IProjectRepository';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { NotFoundError, ValidationError } from '../../domain/common/Errors';

/**
 * Map-backed implementation of IProjectRepository.
 * Project names are unique.
 */
export class InMemoryProjectRepository implements IProjectRepository {
  protected projects: Map<string, Project>;
  private initialized: boolean = false;

  constructor(
    protected idGenerator: IIdGenerator,
    protected clock: IClock,
    protected logger: ILogger
  ) {
    this.projects = new Map();
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    await this.load();
    this.initialized = true;
  }

  protected async ensureFresh(): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
      return;
    }
    await this.refresh();
  }

  protected async load(): Promise<void> {}

  protected async refresh(): Promise<void> {}

  protected async persist(_project: Project): Promise<void> {}

  private findNameOwner(name: string): Project | undefined {
    return Array.from(this.projects.values()).find(p => p.name === name);
  }

  async create(input: CreateProjectInput): Promise<Project> {
    await this.ensureFresh();

    if (this.findNameOwner(input.name)) {
      throw new ValidationError(`Project name '${input.name}' is already taken`);
    }

    const now = this.clock.now();
    const project: Project = {
      id: this.idGenerator.generate('proj'),
      name: input.name,
      description: input.description || '',
      ownerId: input.ownerId,
      createdAt: now,
      updatedAt: now,
      lastActivityAt: null
    };

    this.projects.set(project.id, project);
    try {
      await this.persist(project);
    } catch (err) {
      this.projects.delete(project.id);
      throw err;
    }

    this.logger.debug(`Created project: ${project.id}`);
    return { ...project };
  }

  async findById(id: string): Promise<Project | null> {
    await this.ensureFresh();
    const project = this.projects.get(id);
    return project ? { ...project } : null;
  }

  async findByName(name: string): Promise<Project | null> {
    await this.ensureFresh();
    const project = this.findNameOwner(name);
    return project ? { ...project } : null;
  }

  async findAll(ownerId?: string): Promise<Project[]> {
    await this.ensureFresh();
    return Array.from(this.projects.values())
      .filter(p => ownerId === undefined || p.ownerId === ownerId)
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(p => ({ ...p }));
  }

  async update(id: string, updates: UpdateProjectInput): Promise<Project> {
    await this.ensureFresh();

    const current = this.projects.get(id);
    if (!current) {
      throw new NotFoundError('Project', id);
    }

    if (updates.name !== undefined && updates.name !== current.name) {
      const holder = this.findNameOwner(updates.name);
      if (holder && holder.id !== id) {
        throw new ValidationError(`Project name '${updates.name}' is already taken`);
      }
    }

    const project: Project = { ...current };
    if (updates.name !== undefined) project.name = updates.name;
    if (updates.description !== undefined) project.description = updates.description;
    if (updates.lastActivityAt !== undefined) project.lastActivityAt = updates.lastActivityAt;
    project.updatedAt = this.clock.now();

    this.projects.set(id, project);
    try {
      await this.persist(project);
    } catch (err) {
      this.projects.set(id, current);
      throw err;
    }

    return { ...project };
  }

  async count(): Promise<number> {
    await this.ensureFresh();
    return this.projects.size;
  }
}
