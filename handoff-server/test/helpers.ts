import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { Actor, Project, Task, CreateTaskPayload } from '../src/types';
import { ILogger } from '../src/domain/common/ILogger';
import { IClock } from '../src/domain/common/IClock';
import { TimestampIdGenerator } from '../src/infrastructure/common/TimestampIdGenerator';
import { SystemClock } from '../src/infrastructure/common/SystemClock';
import { InMemoryEventBus } from '../src/infrastructure/events/InMemoryEventBus';
import { InMemoryProjectRepository } from '../src/infrastructure/repositories/InMemoryProjectRepository';
import { InMemoryTaskRepository } from '../src/infrastructure/repositories/InMemoryTaskRepository';
import { InMemoryInteractionLogRepository } from '../src/infrastructure/repositories/InMemoryInteractionLogRepository';
import { AccessGuard } from '../src/application/services/AccessGuard';
import { ProjectService } from '../src/application/services/ProjectService';
import { TaskService } from '../src/application/services/TaskService';
import { InteractionService } from '../src/application/services/InteractionService';
import { WaitCoordinator } from '../src/application/services/WaitCoordinator';
import { Config, ConfigOptions } from '../src/infrastructure/config/Config';
import { createContainer } from '../src/container';
import { createApp } from '../src/app';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Use a unique test directory for each test run
    this.testDir = path.join(os.tmpdir(), `handoff-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 10
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for condition after ${timeout}ms`);
}

/**
 * Wait for a specific time
 */
export async function wait(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const OWNER: Actor = { id: 'user_owner', name: 'Owner' };
export const CREATOR: Actor = { id: 'user_creator', name: 'Creator' };
export const STRANGER: Actor = { id: 'user_stranger' };

/**
 * Logger that records calls instead of printing.
 */
export function createSilentLogger(): jest.Mocked<ILogger> {
  return {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn()
  };
}

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements IClock {
  constructor(private current: number = 1_700_000_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * In-memory service stack, wired the way the container wires it.
 */
export function createHarness(clock: IClock = new SystemClock()) {
  const logger = createSilentLogger();
  const idGenerator = new TimestampIdGenerator();
  const eventBus = new InMemoryEventBus(logger);
  const projectRepo = new InMemoryProjectRepository(idGenerator, clock, logger);
  const taskRepo = new InMemoryTaskRepository(idGenerator, clock, logger);
  const logRepo = new InMemoryInteractionLogRepository(logger);
  const guard = new AccessGuard(projectRepo);
  const projectService = new ProjectService(projectRepo, guard, eventBus, logger);
  const taskService = new TaskService(taskRepo, projectRepo, guard, eventBus, logger);
  const interactionService = new InteractionService(
    taskRepo, logRepo, projectService, guard, eventBus, idGenerator, clock, logger
  );
  const waitCoordinator = new WaitCoordinator(
    taskRepo, projectRepo, logRepo, guard, eventBus, clock, logger
  );

  return {
    logger,
    idGenerator,
    clock,
    eventBus,
    projectRepo,
    taskRepo,
    logRepo,
    guard,
    projectService,
    taskService,
    interactionService,
    waitCoordinator
  };
}

export type Harness = ReturnType<typeof createHarness>;

/**
 * Create a project owned by OWNER.
 */
export function createTestProject(h: Harness, name: string = 'Test Project'): Promise<Project> {
  return h.projectService.createProject(OWNER, { name, description: 'Test project description' });
}

/**
 * Create a task in a project owned by OWNER.
 */
export function createTestTask(
  h: Harness,
  projectId: string,
  overrides: Partial<CreateTaskPayload> = {}
): Promise<Task> {
  return h.taskService.createTask(OWNER, {
    projectId,
    title: 'Test Task',
    description: 'Test task description',
    priority: 'medium',
    ...overrides
  });
}

export const OWNER_TOKEN = 'test-secret';
export const CREATOR_TOKEN = 'creator-secret';
export const STRANGER_TOKEN = 'stranger-secret';

export const auth = (token: string = OWNER_TOKEN) => ({ Authorization: `Bearer ${token}` });

/**
 * Memory-backed container and Express app for HTTP tests.
 */
export async function createTestApp(overrides: Partial<ConfigOptions> = {}) {
  const config = Config.fromObject({
    storage: { type: 'memory' },
    apiTokens: [
      { token: OWNER_TOKEN, actorId: OWNER.id, name: OWNER.name },
      { token: CREATOR_TOKEN, actorId: CREATOR.id, name: CREATOR.name },
      { token: STRANGER_TOKEN, actorId: STRANGER.id }
    ],
    log: { level: 'error', format: 'json' },
    ...overrides
  });
  const container = await createContainer(config);
  await container.initialize();
  return { container, app: createApp(container) };
}
