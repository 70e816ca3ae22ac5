import { Task, InteractionLogEntry } from '../../src/types';
import {
  ConflictError,
  ForbiddenError,
  InvalidStateError,
  NotFoundError,
  SessionMismatchError,
  ValidationError
} from '../../src/domain/common/Errors';
import { createHarness, createTestProject, createTestTask, Harness, OWNER, STRANGER } from '../helpers';

describe('InteractionService', () => {
  let h: Harness;
  let projectId: string;
  let task: Task;

  beforeEach(async () => {
    h = createHarness();
    const project = await createTestProject(h, 'alpha');
    projectId = project.id;
    task = await createTestTask(h, projectId, { status: 'in_progress', isInteractive: true });
  });

  const submitDone = (content: string = 'done') =>
    h.interactionService.submitFeedback(OWNER, {
      taskId: task.id,
      projectName: 'alpha',
      content,
      status: 'done',
      actorTag: 'agent-1'
    });

  describe('submitFeedback', () => {
    it('parks an interactive done claim in waiting_human_feedback with a new session', async () => {
      const result = await submitDone();

      expect(result.task.status).toBe('waiting_human_feedback');
      expect(result.task.aiWaitingFeedback).toBe(true);
      expect(result.task.interactionSessionId).toMatch(/^sess_/);
      expect(result.sessionId).toBe(result.task.interactionSessionId);
      expect(result.waitingHumanFeedback).toBe(true);
      expect(result.task.version).toBe(2);

      const entries = await h.logRepo.findByTaskId(task.id);
      expect(entries).toHaveLength(1);
      expect(entries[0].type).toBe('ai_feedback');
      expect(entries[0].sessionId).toBe(result.sessionId);
      expect(entries[0].id).toMatch(/^ilog_/);
      expect(result.entry).toEqual(entries[0]);
    });

    it('emits task:updated and interaction:logged after both writes', async () => {
      const updates: Task[] = [];
      const logged: InteractionLogEntry[] = [];
      h.eventBus.on('task:updated', t => { updates.push(t); });
      h.eventBus.on('interaction:logged', e => { logged.push(e); });

      const result = await submitDone();

      expect(updates).toEqual([result.task]);
      expect(logged).toHaveLength(1);
      expect(logged[0].id).toBe(result.entry?.id);
    });

    it('touches the project activity timestamp', async () => {
      const result = await submitDone();

      const project = await h.projectRepo.findById(projectId);
      expect(project?.lastActivityAt).toBe(result.task.updatedAt);
    });

    it('applies the status directly on a non-interactive task without a ledger entry', async () => {
      const plain = await createTestTask(h, projectId, { status: 'in_progress' });

      const result = await h.interactionService.submitFeedback(OWNER, {
        taskId: plain.id,
        content: 'shipped',
        status: 'done'
      });

      expect(result.task.status).toBe('done');
      expect(result.task.aiWaitingFeedback).toBe(false);
      expect(result.task.interactionSessionId).toBeNull();
      expect(result.task.feedbackContent).toBe('shipped');
      expect(result.task.completedAt).not.toBeNull();
      expect(result.entry).toBeNull();
      expect(await h.logRepo.findByTaskId(plain.id)).toEqual([]);
    });

    it('defaults the agent label', async () => {
      const result = await h.interactionService.submitFeedback(OWNER, {
        taskId: task.id,
        content: 'halfway',
        status: 'review'
      });

      expect(result.entry?.createdBy).toBe('AI Assistant');
      expect(result.entry?.metadata.ai_identifier).toBe('AI Assistant');
    });

    it('rejects a project name the task does not belong to', async () => {
      await expect(h.interactionService.submitFeedback(OWNER, {
        taskId: task.id,
        projectName: 'beta',
        content: 'done',
        status: 'done'
      })).rejects.toThrow(`Task ${task.id} does not belong to project "beta"`);
    });

    it('rejects callers that neither own the project nor created the task', async () => {
      await expect(h.interactionService.submitFeedback(STRANGER, {
        taskId: task.id,
        content: 'done',
        status: 'done'
      })).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('rejects an unknown task', async () => {
      await expect(h.interactionService.submitFeedback(OWNER, {
        taskId: 'task_missing',
        content: 'done',
        status: 'done'
      })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects an invalid status', async () => {
      await expect(h.interactionService.submitFeedback(OWNER, {
        taskId: task.id,
        content: 'done',
        status: 'finished'
      })).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects a second claim while waiting', async () => {
      await submitDone();

      await expect(submitDone('again')).rejects.toBeInstanceOf(InvalidStateError);
      expect(await h.logRepo.findByTaskId(task.id)).toHaveLength(1);
    });

    it('lets only one of two concurrent submissions win', async () => {
      const results = await Promise.allSettled([submitDone('first'), submitDone('second')]);

      const fulfilled = results.filter(r => r.status === 'fulfilled');
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
      expect(rejected[0].reason.retryable).toBe(true);

      expect(await h.logRepo.findByTaskId(task.id)).toHaveLength(1);
    });

    it('reverts the task write when the ledger append fails', async () => {
      jest.spyOn(h.logRepo, 'append').mockRejectedValueOnce(new Error('disk full'));

      await expect(submitDone()).rejects.toThrow('disk full');

      const stored = await h.taskRepo.findById(task.id);
      expect(stored?.status).toBe('in_progress');
      expect(stored?.aiWaitingFeedback).toBe(false);
      expect(stored?.interactionSessionId).toBeNull();
      expect(stored?.feedbackContent).toBeNull();
      expect(stored?.version).toBe(3);
      expect(await h.logRepo.findByTaskId(task.id)).toEqual([]);
      expect(h.logger.warn).toHaveBeenCalledWith(
        'Reverted task write after ledger append failed',
        { taskId: task.id }
      );
    });
  });

  describe('submitHumanResponse', () => {
    it('completes the task and records the verdict', async () => {
      const { sessionId } = await submitDone();
      expect(sessionId).not.toBeNull();

      const result = await h.interactionService.submitHumanResponse(OWNER, {
        taskId: task.id,
        sessionId: sessionId ?? '',
        content: 'ship it',
        verdict: 'complete'
      });

      expect(result.task.status).toBe('done');
      expect(result.task.aiWaitingFeedback).toBe(false);
      expect(result.task.completedAt).not.toBeNull();
      expect(result.task.interactionSessionId).toBe(sessionId);

      const entries = await h.logRepo.findByTaskId(task.id);
      expect(entries.map(e => [e.type, e.status])).toEqual([
        ['ai_feedback', 'pending'],
        ['human_response', 'completed']
      ]);
      expect(entries[1].createdBy).toBe('Owner');
    });

    it('continues on the same session across a second completion claim', async () => {
      const first = await submitDone();
      const sessionId = first.sessionId ?? '';

      const continued = await h.interactionService.submitHumanResponse(OWNER, {
        taskId: task.id,
        sessionId,
        content: 'check edge cases',
        verdict: 'continue'
      });
      expect(continued.task.status).toBe('in_progress');
      expect(continued.task.interactionSessionId).toBe(sessionId);

      const second = await submitDone('edge cases covered');
      expect(second.sessionId).toBe(sessionId);
      expect(second.task.status).toBe('waiting_human_feedback');

      const aiEntries = await h.logRepo.findBySessionId(sessionId, 'ai_feedback');
      expect(aiEntries.map(e => e.content)).toEqual(['done', 'edge cases covered']);
    });

    it('rejects a mismatched session', async () => {
      await submitDone();

      await expect(h.interactionService.submitHumanResponse(OWNER, {
        taskId: task.id,
        sessionId: 'sess_stale',
        content: 'ok',
        verdict: 'complete'
      })).rejects.toBeInstanceOf(SessionMismatchError);
    });

    it('rejects a task that is not waiting', async () => {
      await expect(h.interactionService.submitHumanResponse(OWNER, {
        taskId: task.id,
        sessionId: 'sess_any',
        content: 'ok',
        verdict: 'complete'
      })).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe('cancellation', () => {
    it('clears the session of a waiting task', async () => {
      await submitDone();

      const result = await h.interactionService.submitFeedback(OWNER, {
        taskId: task.id,
        content: 'dropping this',
        status: 'cancelled'
      });

      expect(result.task.status).toBe('cancelled');
      expect(result.task.aiWaitingFeedback).toBe(false);
      expect(result.task.interactionSessionId).toBeNull();
      expect(result.entry).toBeNull();
      expect(await h.logRepo.findByTaskId(task.id)).toHaveLength(1);
    });
  });

  describe('read-only views', () => {
    it('returns the interaction status without writing', async () => {
      await submitDone();
      const before = await h.taskRepo.findById(task.id);

      const status = await h.interactionService.getInteractionStatus(OWNER, task.id);

      expect(status).toEqual(before);
      expect((await h.taskRepo.findById(task.id))?.version).toBe(before?.version);
    });

    it('returns the history oldest first', async () => {
      const { sessionId } = await submitDone();
      await h.interactionService.submitHumanResponse(OWNER, {
        taskId: task.id,
        sessionId: sessionId ?? '',
        content: 'more tests',
        verdict: 'continue'
      });

      const history = await h.interactionService.getInteractionHistory(OWNER, task.id);

      expect(history.task.id).toBe(task.id);
      expect(history.entries.map(e => e.type)).toEqual(['ai_feedback', 'human_response']);
    });

    it('hides a task from strangers', async () => {
      await expect(h.interactionService.getInteractionHistory(STRANGER, task.id))
        .rejects.toBeInstanceOf(ForbiddenError);
    });
  });
});
