import * as fs from 'fs/promises';
import * as path from 'path';
import { Task } from '../../types';
import { IIdGenerator } from '../../domain/common/IIdGenerator';
import { IClock } from '../../domain/common/IClock';
import { ILogger } from '../../domain/common/ILogger';
import { InMemoryTaskRepository } from './InMemoryTaskRepository';

/**
 * File system based implementation of ITaskRepository.
 * Stores tasks as JSON files organized by project.
 *
 * Every read rescans the task files and re-parses the ones whose mtime or
 * size changed, so writes from other processes sharing the data directory
 * are visible, including to the version check in `update`.
 */
export class FileSystemTaskRepository extends InMemoryTaskRepository {
  private tasksDir: string;
  // file path -> "mtimeMs:size" as of the last parse
  private fileStamps: Map<string, string> = new Map();

  constructor(
    dataDir: string,
    idGenerator: IIdGenerator,
    clock: IClock,
    logger: ILogger
  ) {
    super(idGenerator, clock, logger);
    this.tasksDir = path.join(dataDir, 'tasks');
  }

  protected async load(): Promise<void> {
    try {
      await fs.mkdir(this.tasksDir, { recursive: true });
      await this.scan();
      this.logger.info(`Loaded ${this.tasks.size} tasks`);
    } catch (err) {
      this.logger.error('Failed to initialize task repository:', err as Error);
      throw err;
    }
  }

  protected async refresh(): Promise<void> {
    try {
      await this.scan();
    } catch (err) {
      this.logger.error('Failed to refresh task repository:', err as Error);
      throw err;
    }
  }

  private async scan(): Promise<void> {
    const entries = await fs.readdir(this.tasksDir, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;

      const projectTasksDir = path.join(this.tasksDir, entry.name);
      const taskFiles = await fs.readdir(projectTasksDir);

      for (const file of taskFiles.filter(f => f.endsWith('.json'))) {
        const filePath = path.join(projectTasksDir, file);
        const stat = await fs.stat(filePath);
        const stamp = `${stat.mtimeMs}:${stat.size}`;
        if (this.fileStamps.get(filePath) === stamp) continue;

        if (await this.loadTaskFile(filePath)) {
          this.fileStamps.set(filePath, stamp);
        }
      }
    }
  }

  private async loadTaskFile(filePath: string): Promise<boolean> {
    try {
      const data = await fs.readFile(filePath, 'utf-8');
      const task = JSON.parse(data) as Task;

      // Records written before interactive support
      if (task.isInteractive === undefined) task.isInteractive = false;
      if (task.aiWaitingFeedback === undefined) task.aiWaitingFeedback = false;
      if (task.interactionSessionId === undefined) task.interactionSessionId = null;
      if (task.feedbackContent === undefined) task.feedbackContent = null;
      if (task.feedbackAt === undefined) task.feedbackAt = null;
      if (!task.version) task.version = 1;

      this.tasks.set(task.id, task);
      return true;
    } catch (err) {
      this.logger.warn(`Failed to load task file: ${filePath}`, { error: (err as Error).message });
      return false;
    }
  }

  protected async persist(task: Task): Promise<void> {
    const projectTasksDir = path.join(this.tasksDir, task.projectId);
    await fs.mkdir(projectTasksDir, { recursive: true });
    const filePath = path.join(projectTasksDir, `${task.id}.json`);
    await fs.writeFile(filePath, JSON.stringify(task, null, 2));
  }
}
