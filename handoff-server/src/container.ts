import { Config } from './infrastructure/config/Config';
import { ConsoleLogger } from './infrastructure/common/ConsoleLogger';
import { TimestampIdGenerator } from './infrastructure/common/TimestampIdGenerator';
import { SystemClock } from './infrastructure/common/SystemClock';
import { InMemoryEventBus } from './infrastructure/events/InMemoryEventBus';
import { InMemoryProjectRepository } from './infrastructure/repositories/InMemoryProjectRepository';
import { InMemoryTaskRepository } from './infrastructure/repositories/InMemoryTaskRepository';
import { InMemoryInteractionLogRepository } from './infrastructure/repositories/InMemoryInteractionLogRepository';
import { FileSystemProjectRepository } from './infrastructure/repositories/FileSystemProjectRepository';
import { FileSystemTaskRepository } from './infrastructure/repositories/FileSystemTaskRepository';
import { FileSystemInteractionLogRepository } from './infrastructure/repositories/FileSystemInteractionLogRepository';
import { StaticTokenActorResolver } from './infrastructure/auth/StaticTokenActorResolver';
import { SlidingWindowRateLimiter } from './infrastructure/ratelimit/SlidingWindowRateLimiter';
import { AccessGuard } from './application/services/AccessGuard';
import { ProjectService } from './application/services/ProjectService';
import { TaskService } from './application/services/TaskService';
import { InteractionService } from './application/services/InteractionService';
import { WaitCoordinator } from './application/services/WaitCoordinator';
import { ToolRegistry } from './api/tools/ToolRegistry';
import { createHandoffTools } from './api/tools/handoffTools';
import { ILogger } from './domain/common/ILogger';
import { IIdGenerator } from './domain/common/IIdGenerator';
import { IClock } from './domain/common/IClock';
import { IEventBus } from './domain/events/IEventBus';
import { IProjectRepository } from './domain/repositories/IProjectRepository';
import { ITaskRepository } from './domain/repositories/ITaskRepository';
import { IInteractionLogRepository } from './domain/repositories/IInteractionLogRepository';
import { IActorResolver } from './domain/services/IActorResolver';

/**
 * Dependency injection container.
 * Wires together all application components.
 */
export interface Container {
  // Configuration
  config: Config;

  // Infrastructure
  logger: ILogger;
  idGenerator: IIdGenerator;
  clock: IClock;
  eventBus: IEventBus;
  actorResolver: IActorResolver;
  rateLimiter: SlidingWindowRateLimiter;

  // Repositories
  projectRepo: IProjectRepository;
  taskRepo: ITaskRepository;
  interactionLogRepo: IInteractionLogRepository;

  // Services
  accessGuard: AccessGuard;
  projectService: ProjectService;
  taskService: TaskService;
  interactionService: InteractionService;
  waitCoordinator: WaitCoordinator;
  toolRegistry: ToolRegistry;

  // Lifecycle
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

function createRepositories(config: Config, idGenerator: IIdGenerator, clock: IClock, logger: ILogger) {
  if (config.storage.type === 'memory') {
    return {
      projectRepo: new InMemoryProjectRepository(idGenerator, clock, logger),
      taskRepo: new InMemoryTaskRepository(idGenerator, clock, logger),
      interactionLogRepo: new InMemoryInteractionLogRepository(logger)
    };
  }
  return {
    projectRepo: new FileSystemProjectRepository(config.dataDir, idGenerator, clock, logger),
    taskRepo: new FileSystemTaskRepository(config.dataDir, idGenerator, clock, logger),
    interactionLogRepo: new FileSystemInteractionLogRepository(config.dataDir, logger)
  };
}

/**
 * Create and wire up all dependencies.
 */
export async function createContainer(config: Config = new Config()): Promise<Container> {
  // 1. Infrastructure - Core
  const logger = new ConsoleLogger(config.log.level, {}, config.log.format);
  const idGenerator = new TimestampIdGenerator();
  const clock = new SystemClock();
  const eventBus = new InMemoryEventBus(logger);
  const actorResolver = new StaticTokenActorResolver(config.apiTokens);
  const rateLimiter = new SlidingWindowRateLimiter(config.rateLimit, clock);

  // 2. Repositories
  const { projectRepo, taskRepo, interactionLogRepo } = createRepositories(config, idGenerator, clock, logger);

  // 3. Services
  const accessGuard = new AccessGuard(projectRepo);
  const projectService = new ProjectService(projectRepo, accessGuard, eventBus, logger);
  const taskService = new TaskService(taskRepo, projectRepo, accessGuard, eventBus, logger);
  const interactionService = new InteractionService(
    taskRepo,
    interactionLogRepo,
    projectService,
    accessGuard,
    eventBus,
    idGenerator,
    clock,
    logger
  );
  const waitCoordinator = new WaitCoordinator(
    taskRepo,
    projectRepo,
    interactionLogRepo,
    accessGuard,
    eventBus,
    clock,
    logger
  );

  // 4. Tools
  const toolRegistry = new ToolRegistry();
  for (const tool of createHandoffTools({ interactionService, waitCoordinator, taskService, projectService })) {
    toolRegistry.register(tool);
  }

  let evictionTimer: NodeJS.Timeout | undefined;

  const container: Container = {
    config,
    logger,
    idGenerator,
    clock,
    eventBus,
    actorResolver,
    rateLimiter,
    projectRepo,
    taskRepo,
    interactionLogRepo,
    accessGuard,
    projectService,
    taskService,
    interactionService,
    waitCoordinator,
    toolRegistry,

    async initialize() {
      logger.info('Initializing container...', { storage: config.storage.type });

      // Initialize repositories
      await projectRepo.initialize();
      await taskRepo.initialize();
      await interactionLogRepo.initialize();

      if (config.apiTokens.length === 0) {
        logger.warn('No API_TOKENS configured; every /api request will be rejected');
      }

      evictionTimer = setInterval(() => {
        const removed = rateLimiter.evictExpired();
        if (removed > 0) {
          logger.debug('Evicted idle rate limit keys', { removed });
        }
      }, config.rateLimit.windowMs);
      evictionTimer.unref();

      logger.info('Container initialized');
    },

    async shutdown() {
      logger.info('Shutting down container...');
      clearInterval(evictionTimer);
      eventBus.removeAllListeners();
      logger.info('Container shutdown complete');
    }
  };

  return container;
}
