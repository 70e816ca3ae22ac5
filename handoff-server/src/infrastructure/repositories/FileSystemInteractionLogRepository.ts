import * as fs from 'fs/promises';
import * as path from 'path';
import { InteractionLogEntry } from '../../types';
import { ILogger } from '../../domain/common/ILogger';
import { InMemoryInteractionLogRepository } from './InMemoryInteractionLogRepository';

/**
 * File system based ledger.
 * One JSON file per entry under interactions/<taskId>/, written once and never rewritten.
 * Lookups rescan the directory for entries appended by other processes.
 */
export class FileSystemInteractionLogRepository extends InMemoryInteractionLogRepository {
  private interactionsDir: string;

  constructor(dataDir: string, logger: ILogger) {
    super(logger);
    this.interactionsDir = path.join(dataDir, 'interactions');
  }

  protected async load(): Promise<void> {
    try {
      await fs.mkdir(this.interactionsDir, { recursive: true });
      await this.scan();
      this.logger.info(`Loaded ${this.entries.size} interaction log entries`);
    } catch (err) {
      this.logger.error('Failed to initialize interaction log repository:', err as Error);
      throw err;
    }
  }

  protected async refresh(): Promise<void> {
    try {
      await this.scan();
    } catch (err) {
      this.logger.error('Failed to refresh interaction log repository:', err as Error);
      throw err;
    }
  }

  private async scan(): Promise<void> {
    const taskDirs = await fs.readdir(this.interactionsDir, { withFileTypes: true });
    const loaded: InteractionLogEntry[] = [];

    for (const taskDir of taskDirs) {
      if (!taskDir.isDirectory()) continue;

      const dirPath = path.join(this.interactionsDir, taskDir.name);
      const files = await fs.readdir(dirPath);

      for (const file of files.filter(f => f.endsWith('.json'))) {
        // Entries are immutable; a known id never needs re-reading
        if (this.entries.has(path.basename(file, '.json'))) continue;

        try {
          const data = await fs.readFile(path.join(dirPath, file), 'utf-8');
          loaded.push(JSON.parse(data) as InteractionLogEntry);
        } catch (err) {
          this.logger.warn(`Failed to load interaction file: ${file}`, { error: (err as Error).message });
        }
      }
    }

    // Directory listing order is arbitrary; restore chronological insertion order
    loaded.sort((a, b) => a.createdAt - b.createdAt);
    for (const entry of loaded) {
      this.entries.set(entry.id, entry);
    }
  }

  protected async persist(entry: InteractionLogEntry): Promise<void> {
    const taskDir = path.join(this.interactionsDir, entry.taskId);
    await fs.mkdir(taskDir, { recursive: true });
    // 'wx' refuses to overwrite an existing entry
    await fs.writeFile(path.join(taskDir, `${entry.id}.json`), JSON.stringify(entry, null, 2), { flag: 'wx' });
  }
}
