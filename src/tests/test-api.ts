import { beforeEach, describe, expect, it } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '@/api/app.js';
import type { SessionRegistry } from '@/application/game/SessionRegistry.js';
import type { DatabaseConnection } from '@/infrastructure/database/lowdb/connection.js';
import { ProviderId } from '@/domain/llm/types.js';
import { ScriptedProvider, testRegistry } from './helpers.js';

describe('HTTP API', () => {
  let app: Application;
  let registry: SessionRegistry;
  let db: DatabaseConnection;

  beforeEach(async () => {
    ({ registry, db } = await testRegistry({ provider: new ScriptedProvider([]) }));
    app = createApp({ registry, logFormat: false });
  });

  async function createSession(): Promise<string> {
    const res = await request(app).post('/api/sessions').send({});
    expect(res.status).toBe(201);
    return res.body.session.sessionId;
  }

  it('reports health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', sessions: 0 });
  });

  it('creates a session on the configured provider', async () => {
    const res = await request(app).post('/api/sessions').send({});

    expect(res.status).toBe(201);
    expect(res.body.success).toBe(true);
    expect(res.body.session).toMatchObject({
      turn: 0,
      provider: { id: ProviderId.RuleBased, active: true },
      metadata: { playerLocation: 'hall', inventoryCount: 0, combatActive: false },
    });
    expect(registry.size).toBe(1);
  });

  it('refuses a provider that is not configured', async () => {
    const res = await request(app).post('/api/sessions').send({ provider: ProviderId.Anthropic });

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      code: 'CONFIG_ERROR',
      message: 'Anthropic Claude: Anthropic API key is not set',
      details: { field: 'ANTHROPIC_API_KEY' },
    });
    expect(registry.size).toBe(0);
  });

  it('validates request bodies', async () => {
    const res = await request(app).post('/api/sessions').send({ provider: 9 });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details[0].path).toBe('provider');
  });

  it('runs commands and returns the narrative result', async () => {
    const id = await createSession();
    const res = await request(app).post(`/api/sessions/${id}/commands`).send({ command: 'go north' });

    expect(res.status).toBe(200);
    expect(res.body.result.blocks).toEqual([
      {
        style: 'location',
        text: 'Library\nDusty shelves lean under the weight of old books.\nExits: south\nHere: goblin (neutral)',
      },
    ]);
    expect(res.body.result.metadata).toEqual({ playerLocation: 'library', inventoryCount: 0, combatActive: false });
  });

  it('turns refusals into narrative, not HTTP errors', async () => {
    const id = await createSession();
    const res = await request(app).post(`/api/sessions/${id}/commands`).send({ command: 'attack goblin' });

    expect(res.status).toBe(200);
    expect(res.body.result.blocks).toEqual([{ style: 'error', text: 'There is no goblin here to fight.' }]);
  });

  it('returns 404 for unknown sessions', async () => {
    const res = await request(app).post('/api/sessions/nope/commands').send({ command: 'look' });
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'SESSION_NOT_FOUND', message: 'Session not found: nope', details: { sessionId: 'nope' } },
    });
  });

  it('lists and switches providers', async () => {
    const id = await createSession();

    const list = await request(app).get(`/api/sessions/${id}/providers`);
    expect(list.body.providers).toHaveLength(6);

    const ok = await request(app).post(`/api/sessions/${id}/provider`).send({ provider: ProviderId.OpenAI });
    expect(ok.body.provider).toMatchObject({ id: ProviderId.OpenAI, name: 'OpenAI', active: true });

    const refused = await request(app).post(`/api/sessions/${id}/provider`).send({ provider: ProviderId.Google });
    expect(refused.status).toBe(400);
    expect(refused.body.error.details.field).toBe('GOOGLE_API_KEY');
  });

  it('saves, lists, loads and deletes slots', async () => {
    const id = await createSession();
    await request(app).post(`/api/sessions/${id}/commands`).send({ command: 'take brass key' });

    const saved = await request(app).post(`/api/sessions/${id}/saves`).send({ slotName: 'camp' });
    expect(saved.status).toBe(201);
    expect(saved.body.save).toMatchObject({ slotName: 'camp', turn: 1 });

    await request(app).post(`/api/sessions/${id}/commands`).send({ command: 'drop brass key' });

    const loaded = await request(app).post(`/api/sessions/${id}/load`).send({ slotName: 'camp' });
    expect(loaded.status).toBe(200);
    expect(loaded.body.session).toMatchObject({ turn: 1, metadata: { inventoryCount: 1 } });

    const slots = await request(app).get(`/api/sessions/${id}/saves`);
    expect(slots.body.slots.map((s: { slotName: string }) => s.slotName)).toEqual(['camp']);

    expect((await request(app).delete(`/api/sessions/${id}/saves/camp`)).status).toBe(200);
    const missing = await request(app).post(`/api/sessions/${id}/load`).send({ slotName: 'camp' });
    expect(missing.status).toBe(404);
    expect(missing.body.error).toMatchObject({ code: 'SAVE_NOT_FOUND', message: 'No save named "camp"' });
  });

  it('resumes a named session from its save after a restart', async () => {
    const created = await request(app).post('/api/sessions').send({ sessionId: 'hero' });
    expect(created.status).toBe(201);
    expect(created.body.session.sessionId).toBe('hero');
    await request(app).post('/api/sessions/hero/commands').send({ command: 'go north' });
    await request(app).post('/api/sessions/hero/saves').send({ slotName: 'camp' });

    const { registry: restarted } = await testRegistry({ provider: new ScriptedProvider([]), db });
    const nextRun = createApp({ registry: restarted, logFormat: false });
    const resumed = await request(nextRun).post('/api/sessions').send({ sessionId: 'hero', slotName: 'camp' });

    expect(resumed.status).toBe(201);
    expect(resumed.body.session).toMatchObject({
      sessionId: 'hero',
      turn: 1,
      metadata: { playerLocation: 'library', inventoryCount: 0, combatActive: false },
    });
  });

  it('refuses to open a session id that is already live', async () => {
    await request(app).post('/api/sessions').send({ sessionId: 'hero' });
    const res = await request(app).post('/api/sessions').send({ sessionId: 'hero' });

    expect(res.status).toBe(409);
    expect(res.body.error).toEqual({
      code: 'SESSION_EXISTS',
      message: 'Session already open: hero',
      details: { sessionId: 'hero' },
    });
    expect(registry.size).toBe(1);
  });

  it('does not keep a session whose save is missing', async () => {
    const res = await request(app).post('/api/sessions').send({ sessionId: 'ghost', slotName: 'camp' });
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('SAVE_NOT_FOUND');
    expect(registry.size).toBe(0);
  });

  it('validates session ids', async () => {
    const res = await request(app).post('/api/sessions').send({ sessionId: 'a/b' });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details[0].path).toBe('sessionId');
  });

  it('reports unreadable JSON as a validation error', async () => {
    const res = await request(app).post('/api/sessions').set('Content-Type', 'application/json').send('{"provider":');
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' });
  });

  it('rejects bad slot names', async () => {
    const id = await createSession();
    const res = await request(app).post(`/api/sessions/${id}/saves`).send({ slotName: '../etc' });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
  });

  it('closes sessions', async () => {
    const id = await createSession();
    expect((await request(app).delete(`/api/sessions/${id}`)).status).toBe(200);
    expect((await request(app).get(`/api/sessions/${id}`)).status).toBe(404);
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/api/nothing');
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe('NOT_FOUND');
  });
});
