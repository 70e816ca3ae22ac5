import request from 'supertest';
import express from 'express';
import { Container } from '../src/container';
import { MESSAGES } from '../src/api/presenters';
import { createTestApp, auth, waitFor, wait, OWNER_TOKEN, STRANGER_TOKEN } from './helpers';

describe('Tool API', () => {
  let app: express.Express;
  let container: Container;

  const callTool = (name: string, args: Record<string, unknown> = {}, token: string = OWNER_TOKEN) =>
    request(app).post('/api/tools/call').set(auth(token)).send({ name, arguments: args });

  beforeEach(async () => {
    ({ app, container } = await createTestApp());
    await request(app).post('/api/projects').set(auth()).send({ name: 'alpha' }).expect(201);
  });

  afterEach(async () => {
    await container.shutdown();
  });

  describe('GET /api/tools', () => {
    it('should describe every tool with its input schema', async () => {
      const response = await request(app).get('/api/tools').set(auth()).expect(200);

      expect(response.body.tools.map((t: { name: string }) => t.name)).toEqual([
        'submit_task_feedback',
        'submit_human_feedback',
        'wait_for_new_tasks',
        'wait_for_human_feedback',
        'get_interaction_status',
        'get_interaction_history',
        'get_project_tasks_by_name',
        'get_task_by_id',
        'create_task',
        'update_task',
        'list_user_projects',
        'get_project_info'
      ]);
      expect(response.body.tools[0].inputSchema.required)
        .toEqual(['task_id', 'project_name', 'feedback_content', 'status']);
      expect(response.headers['x-ratelimit-limit']).toBe('60');
    });
  });

  describe('POST /api/tools/call', () => {
    it('should list the caller\'s projects', async () => {
      const response = await callTool('list_user_projects').expect(200);

      expect(response.body.total_projects).toBe(1);
      expect(response.body.projects[0]).toMatchObject({ name: 'alpha', owner_id: 'user_owner' });
    });

    it('should create and fetch tasks by project name', async () => {
      const created = await callTool('create_task', {
        project_name: 'alpha',
        title: 'Write parser',
        is_interactive: true
      }).expect(200);

      expect(created.body).toMatchObject({
        title: 'Write parser',
        status: 'todo',
        is_interactive: true,
        creator_id: 'user_owner',
        version: 1
      });

      const fetched = await callTool('get_task_by_id', { task_id: created.body.id }).expect(200);
      expect(fetched.body).toEqual(created.body);

      const open = await callTool('get_project_tasks_by_name', { project_name: 'alpha' }).expect(200);
      expect(open.body.total_tasks).toBe(1);
      expect(open.body.project_name).toBe('alpha');

      const done = await callTool('get_project_tasks_by_name', { project_name: 'alpha', status: 'done' }).expect(200);
      expect(done.body.total_tasks).toBe(0);
    });

    it('should apply a non-interactive status directly', async () => {
      const created = await callTool('create_task', { project_name: 'alpha', title: 'Plain' }).expect(200);

      const response = await callTool('submit_task_feedback', {
        task_id: created.body.id,
        project_name: 'alpha',
        feedback_content: 'Shipped',
        status: 'done'
      }).expect(200);

      expect(response.body).toMatchObject({
        status: 'done',
        feedback_submitted: true,
        feedback_content: 'Shipped',
        ai_identifier: 'AI Assistant',
        is_interactive: false,
        session_id: null
      });
      expect(response.body.waiting_human_feedback).toBeUndefined();
    });

    it('should return 404 for an unknown tool', async () => {
      const response = await callTool('nope').expect(404);

      expect(response.body.message).toBe("Tool 'nope' not found");
    });

    it('should return 400 with the failing argument', async () => {
      const response = await callTool('submit_task_feedback', {
        project_name: 'alpha',
        feedback_content: 'done',
        status: 'done'
      }).expect(400);

      expect(response.body.code).toBe('INVALID_ARGUMENT');
      expect(response.body.message).toBe('Invalid arguments for submit_task_feedback');
      expect(response.body.details.map((d: { path: string }) => d.path)).toEqual(['task_id']);
    });

    it('should list the accepted statuses for an invalid one', async () => {
      const created = await callTool('create_task', { project_name: 'alpha', title: 'One' }).expect(200);

      const response = await callTool('submit_task_feedback', {
        task_id: created.body.id,
        project_name: 'alpha',
        feedback_content: 'done',
        status: 'finished'
      }).expect(400);

      expect(response.body.message)
        .toBe('Invalid status. Must be one of: in_progress, review, done, cancelled, waiting_human_feedback');
    });

    it('should reject extra fields in the call envelope', async () => {
      const response = await request(app)
        .post('/api/tools/call')
        .set(auth())
        .send({ name: 'list_user_projects', extra: true })
        .expect(400);

      expect(response.body.message).toBe('Invalid request body');
    });

    it('should refuse project tools to non-owners', async () => {
      const response = await callTool('get_project_tasks_by_name', { project_name: 'alpha' }, STRANGER_TOKEN)
        .expect(403);

      expect(response.body.message).toBe("No access to project 'alpha'");
    });

    it('should return new tasks to a waiting agent as soon as they are created', async () => {
      const pending = callTool('wait_for_new_tasks', { project_name: 'alpha' }).then(res => res);

      await waitFor(() => (container.eventBus.listenerCount?.('task:created') ?? 0) > 0);
      await wait(5);
      await callTool('create_task', { project_name: 'alpha', title: 'Fresh work' }).expect(200);
      const response = await pending;

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        project_name: 'alpha',
        total_new_tasks: 1,
        timeout: false,
        timeout_seconds: 3600,
        poll_interval_seconds: 30
      });
      expect(response.body.new_tasks[0].title).toBe('Fresh work');
    });
  });

  describe('wait_for_new_tasks arguments', () => {
    const SECONDS_MESSAGE = 'timeout_seconds and poll_interval_seconds must be valid numbers';

    it.each([
      ['null', null],
      ['an empty string', ''],
      ['a boolean', true],
      ['a non-numeric string', 'soon']
    ])('should reject %s as timeout_seconds', async (_label, value) => {
      const response = await callTool('wait_for_new_tasks', { project_name: 'alpha', timeout_seconds: value })
        .expect(400);

      expect(response.body.message).toBe('Invalid arguments for wait_for_new_tasks');
      expect(response.body.details).toEqual([{ path: 'timeout_seconds', message: SECONDS_MESSAGE }]);
    });

    it('should list the caller\'s own projects for an unknown project', async () => {
      const response = await callTool('wait_for_new_tasks', { project_name: 'nope' }).expect(404);

      expect(response.body.message).toBe("Project 'nope' not found");
      expect(response.body.details).toEqual({
        available_projects: [{ id: expect.stringMatching(/^proj_/), name: 'alpha' }]
      });
    });

    it('should not reveal other owners\' projects', async () => {
      const response = await callTool('wait_for_new_tasks', { project_name: 'nope' }, STRANGER_TOKEN).expect(404);

      expect(response.body.details).toEqual({ available_projects: [] });
    });
  });

  describe('update_task', () => {
    it('should change title and priority without touching status', async () => {
      const created = await callTool('create_task', { project_name: 'alpha', title: 'Original' }).expect(200);

      const response = await callTool('update_task', {
        task_id: created.body.id,
        title: 'Renamed',
        priority: 'high'
      }).expect(200);

      expect(response.body).toMatchObject({
        id: created.body.id,
        title: 'Renamed',
        priority: 'high',
        description: '',
        status: 'todo',
        version: 2
      });
    });

    it('should hold a done claim on an interactive task for human sign-off', async () => {
      const created = await callTool('create_task', {
        project_name: 'alpha',
        title: 'Gated',
        is_interactive: true
      }).expect(200);

      const response = await callTool('update_task', {
        task_id: created.body.id,
        priority: 'urgent',
        status: 'done',
        feedback_content: 'All done'
      }).expect(200);

      expect(response.body).toMatchObject({
        priority: 'urgent',
        status: 'waiting_human_feedback',
        ai_waiting_feedback: true,
        feedback_content: 'All done',
        waiting_human_feedback: true,
        message: MESSAGES.awaitingHuman,
        version: 3
      });
      expect(response.body.session_id).toMatch(/^sess_/);
      expect(response.body.interaction_session_id).toBe(response.body.session_id);

      const history = await callTool('get_interaction_history', { task_id: created.body.id }).expect(200);
      expect(history.body.total_interactions).toBe(1);
      expect(history.body.interactions[0]).toMatchObject({ interaction_type: 'ai_feedback', content: 'All done' });
    });

    it('should require feedback_content with a status', async () => {
      const created = await callTool('create_task', { project_name: 'alpha', title: 'One' }).expect(200);

      const response = await callTool('update_task', { task_id: created.body.id, status: 'done' }).expect(400);

      expect(response.body.details).toEqual([{ path: 'feedback_content', message: 'Required when status is given' }]);
    });

    it('should reject a call that changes nothing', async () => {
      const created = await callTool('create_task', { project_name: 'alpha', title: 'One' }).expect(200);

      const response = await callTool('update_task', { task_id: created.body.id }).expect(400);

      expect(response.body.message).toBe('At least one field must be provided for update');
    });

    it('should refuse strangers', async () => {
      const created = await callTool('create_task', { project_name: 'alpha', title: 'One' }).expect(200);

      await callTool('update_task', { task_id: created.body.id, title: 'Mine now' }, STRANGER_TOKEN).expect(403);
    });
  });

  describe('get_project_info', () => {
    it('should count tasks per status', async () => {
      await callTool('create_task', { project_name: 'alpha', title: 'A' }).expect(200);
      await callTool('create_task', { project_name: 'alpha', title: 'B', status: 'review' }).expect(200);

      const response = await callTool('get_project_info', { project_name: 'alpha' }).expect(200);

      expect(response.body.name).toBe('alpha');
      expect(response.body.owner_id).toBe('user_owner');
      expect(response.body.statistics).toEqual({
        total_tasks: 2,
        todo_tasks: 1,
        in_progress_tasks: 0,
        review_tasks: 1,
        done_tasks: 0,
        cancelled_tasks: 0,
        waiting_human_feedback_tasks: 0
      });
      expect(response.body.recent_tasks.map((t: { title: string }) => t.title).sort()).toEqual(['A', 'B']);

      const byId = await callTool('get_project_info', { project_id: response.body.id }).expect(200);
      expect(byId.body.name).toBe('alpha');
    });

    it('should list the caller\'s projects when the project is unknown', async () => {
      const response = await callTool('get_project_info', { project_name: 'nope' }).expect(404);

      expect(response.body.details.available_projects.map((p: { name: string }) => p.name)).toEqual(['alpha']);
    });

    it('should require a project id or name', async () => {
      const response = await callTool('get_project_info', {}).expect(400);

      expect(response.body.details).toEqual([{ path: '', message: 'Either project_id or project_name is required' }]);
    });

    it('should refuse non-owners', async () => {
      const response = await callTool('get_project_info', { project_name: 'alpha' }, STRANGER_TOKEN).expect(403);

      expect(response.body.message).toBe("No access to project 'alpha'");
    });
  });

  describe('rate limiting', () => {
    it('should answer 429 with Retry-After once the window is used up', async () => {
      await container.shutdown();
      ({ app, container } = await createTestApp({ rateLimit: { maxRequests: 2, windowMs: 60000 } }));

      await request(app).get('/api/tools').set(auth()).expect(200);
      const second = await request(app).get('/api/tools').set(auth()).expect(200);
      expect(second.headers['x-ratelimit-remaining']).toBe('0');

      const response = await request(app).get('/api/tools').set(auth()).expect(429);

      expect(response.body.code).toBe('RATE_LIMITED');
      expect(response.body.retryable).toBe(true);
      expect(response.headers['retry-after']).toBe('60');

      // Other routes are not limited
      await request(app).get('/api/projects').set(auth()).expect(200);
    });
  });
});
