import { InteractionLogEntry } from '../../src/types';
import { InMemoryInteractionLogRepository } from '../../src/infrastructure/repositories/InMemoryInteractionLogRepository';
import { InvalidStateError } from '../../src/domain/common/Errors';
import { createSilentLogger } from '../helpers';

function entry(id: string, overrides: Partial<InteractionLogEntry> = {}): InteractionLogEntry {
  return {
    id,
    taskId: 'task_1',
    sessionId: 'sess_1',
    type: 'human_response',
    status: 'continued',
    content: id,
    metadata: {},
    createdAt: 1000,
    createdBy: 'Owner',
    ...overrides
  };
}

describe('InMemoryInteractionLogRepository', () => {
  let repo: InMemoryInteractionLogRepository;

  beforeEach(() => {
    repo = new InMemoryInteractionLogRepository(createSilentLogger());
  });

  it('refuses to overwrite an entry', async () => {
    await repo.append(entry('ilog_1'));

    await expect(repo.append(entry('ilog_1', { content: 'changed' }))).rejects.toBeInstanceOf(InvalidStateError);
    expect((await repo.findById('ilog_1'))?.content).toBe('ilog_1');
  });

  it('keeps append order for entries with the same timestamp', async () => {
    await repo.append(entry('ilog_b', { type: 'ai_feedback', status: 'pending' }));
    await repo.append(entry('ilog_a'));

    expect((await repo.findByTaskId('task_1')).map(e => e.id)).toEqual(['ilog_b', 'ilog_a']);
  });

  it('filters a session by type', async () => {
    await repo.append(entry('ilog_1', { type: 'ai_feedback', status: 'pending' }));
    await repo.append(entry('ilog_2'));
    await repo.append(entry('ilog_3', { sessionId: 'sess_2' }));

    expect((await repo.findBySessionId('sess_1', 'human_response')).map(e => e.id)).toEqual(['ilog_2']);
    expect((await repo.findBySessionId('sess_1')).map(e => e.id)).toEqual(['ilog_1', 'ilog_2']);
  });

  it('finds the newest human response strictly after a time', async () => {
    await repo.append(entry('ilog_old', { createdAt: 1000 }));
    await repo.append(entry('ilog_new', { createdAt: 2000, status: 'completed' }));
    await repo.append(entry('ilog_ai', { createdAt: 3000, type: 'ai_feedback', status: 'pending' }));

    expect((await repo.findLatestResponse('sess_1'))?.id).toBe('ilog_new');
    expect((await repo.findLatestResponse('sess_1', 1999))?.id).toBe('ilog_new');
    expect((await repo.findLatestResponse('sess_1', 1000))?.id).toBe('ilog_new');
    expect(await repo.findLatestResponse('sess_1', 2000)).toBeNull();
    expect(await repo.findLatestResponse('sess_other')).toBeNull();
  });

  it('hands out copies of metadata', async () => {
    await repo.append(entry('ilog_1', { metadata: { action: 'continue' } }));

    const found = await repo.findById('ilog_1');
    if (found) found.metadata.action = 'complete';

    expect((await repo.findById('ilog_1'))?.metadata).toEqual({ action: 'continue' });
  });
});
