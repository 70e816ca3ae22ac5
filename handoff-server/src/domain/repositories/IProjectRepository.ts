import { Project } from '../../types';

/**
 * Input for creating a project (without generated fields).
 */
export type CreateProjectInput = Pick<Project, 'name' | 'description' | 'ownerId'>;

/**
 * Input for updating a project (partial, without immutable fields).
 */
export type UpdateProjectInput = Partial<Pick<Project, 'name' | 'description' | 'lastActivityAt'>>;

/**
 * Repository interface for Project persistence operations.
 * Implementations can be filesystem-based, in-memory, etc.
 */
export interface IProjectRepository {
  /**
   * Create a new project.
   * @returns The created project with generated id and timestamps
   */
  create(project: CreateProjectInput): Promise<Project>;

  findById(id: string): Promise<Project | null>;

  /**
   * Find a project by its unique name.
   */
  findByName(name: string): Promise<Project | null>;

  /**
   * Find all projects, optionally only those owned by one actor.
   */
  findAll(ownerId?: string): Promise<Project[]>;

  /**
   * @throws {NotFoundError} if project not found
   */
  update(id: string, updates: UpdateProjectInput): Promise<Project>;

  count(): Promise<number>;

  initialize(): Promise<void>;
}
