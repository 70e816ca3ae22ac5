import * as fs from 'fs/promises';
import * as path from 'path';
import { Project } from '../../types';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { InMemoryProjectRepository } from './InMemoryProjectRepository';

/**
 * File system based implementation of IProjectRepository.
 * Stores projects as individual JSON files; changed files are re-read on every lookup.
 */
export class FileSystemProjectRepository extends InMemoryProjectRepository {
  private projectsDir: string;
  private fileStamps: Map<string, string> = new Map();

  constructor(
    dataDir: string,
    idGenerator: IIdGenerator,
    clock: IClock,
    logger: ILogger
  ) {
    super(idGenerator, clock, logger);
    this.projectsDir = path.join(dataDir, 'projects');
  }

  protected async load(): Promise<void> {
    try {
      await fs.mkdir(this.projectsDir, { recursive: true });
      await this.scan();
      this.logger.info(`Loaded ${this.projects.size} projects`);
    } catch (err) {
      this.logger.error('Failed to initialize project repository:', err as Error);
      throw err;
    }
  }

  protected async refresh(): Promise<void> {
    try {
      await this.scan();
    } catch (err) {
      this.logger.error('Failed to refresh project repository:', err as Error);
      throw err;
    }
  }

  private async scan(): Promise<void> {
    const files = await fs.readdir(this.projectsDir);

    for (const file of files.filter(f => f.endsWith('.json'))) {
      const filePath = path.join(this.projectsDir, file);
      const stat = await fs.stat(filePath);
      const stamp = `${stat.mtimeMs}:${stat.size}`;
      if (this.fileStamps.get(filePath) === stamp) continue;

      try {
        const data = await fs.readFile(filePath, 'utf-8');
        const project = JSON.parse(data) as Project;
        if (project.lastActivityAt === undefined) project.lastActivityAt = null;
        this.projects.set(project.id, project);
        this.fileStamps.set(filePath, stamp);
      } catch (err) {
        this.logger.warn(`Failed to load project file: ${file}`, { error: (err as Error).message });
      }
    }
  }

  protected async persist(project: Project): Promise<void> {
    const filePath = path.join(this.projectsDir, `${project.id}.json`);
    await fs.writeFile(filePath, JSON.stringify(project, null, 2));
  }
}
