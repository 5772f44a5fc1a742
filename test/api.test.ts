/**
 * API Endpoint Tests
 *
 * Exercises the news item endpoints against an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { ApiServer, type ServerConfig } from '../src/server/express.js';
import { openDatabase, MEMORY_PATH, type DatabaseManager } from '../src/storage/sqlite.js';

const API_KEY = 'test-secret';

const serverConfig: ServerConfig = {
  port: 0,
  host: '127.0.0.1',
  apiKey: API_KEY,
  apiKeyHeader: 'X-API-Key',
  corsOrigins: [],
  logRequests: false,
};

const payload = {
  title: 'A',
  body: 'b',
  date: '2024-01-01',
  category: 'c',
};

describe('API Endpoints', () => {
  let database: DatabaseManager;
  let server: ApiServer;
  let app: Express;

  const create = (body: object = payload) =>
    request(app).post('/items').set('X-API-Key', API_KEY).send(body);

  beforeEach(() => {
    database = openDatabase({ path: MEMORY_PATH });
    server = new ApiServer(database, serverConfig);
    app = server.getApp();
  });

  afterEach(() => {
    database.close();
  });

  describe('GET /health', () => {
    it('returns ok status with the item count', async () => {
      await create();
      const res = await request(app).get('/health');

      expect(res.status).toBe(200);
      expect(res.body.status).toBe('ok');
      expect(res.body.items).toBe(1);
      expect(typeof res.body.timestamp).toBe('number');
    });

    it('returns 503 once the database is closed', async () => {
      database.close();
      const res = await request(app).get('/health');

      expect(res.status).toBe(503);
      expect(res.body).toEqual({ error: 'Database not initialized' });
    });
  });

  describe('GET /items', () => {
    it('returns an empty array initially', async () => {
      const res = await request(app).get('/items');

      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it('returns all items in ascending id order', async () => {
      await create({ ...payload, title: 'first' });
      await create({ ...payload, title: 'second' });

      const res = await request(app).get('/items');

      expect(res.status).toBe(200);
      expect(res.body).toEqual([
        { id: 1, ...payload, title: 'first' },
        { id: 2, ...payload, title: 'second' },
      ]);
    });

    it('returns N - M items after N creates and M deletes', async () => {
      for (let i = 0; i < 4; i++) {
        await create();
      }
      await request(app).delete('/items/2').set('X-API-Key', API_KEY);

      const res = await request(app).get('/items');
      expect(res.body).toHaveLength(3);
      expect(res.body.map((item: { id: number }) => item.id)).toEqual([1, 3, 4]);
    });
  });

  describe('POST /items', () => {
    it('creates an item and returns 201 with the assigned id', async () => {
      const res = await create();

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ id: 1, ...payload });
    });

    it('round-trips through GET', async () => {
      const created = await create();
      const res = await request(app).get(`/items/${created.body.id}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id: created.body.id, ...payload });
    });

    it('ignores a caller-supplied id', async () => {
      const res = await create({ ...payload, id: 500 });

      expect(res.status).toBe(201);
      expect(res.body.id).toBe(1);
    });

    it('returns 422 for an empty title and stores nothing', async () => {
      const res = await create({ ...payload, title: '' });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Validation failed',
        details: [{ field: 'title', message: 'title must not be empty' }],
      });

      const list = await request(app).get('/items');
      expect(list.body).toEqual([]);
    });

    it('returns 422 for an invalid date', async () => {
      const res = await create({ ...payload, date: '2024-02-30' });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([
        { field: 'date', message: 'date must be a calendar date in YYYY-MM-DD form' },
      ]);
    });

    it('returns 422 for malformed JSON', async () => {
      const res = await request(app)
        .post('/items')
        .set('X-API-Key', API_KEY)
        .set('Content-Type', 'application/json')
        .send('{"title": ');

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Validation failed',
        details: [{ field: '(body)', message: 'Malformed JSON body' }],
      });
    });

    it('stores a title of 200 emoji', async () => {
      const title = '\u{1F4F0}'.repeat(200);
      const res = await create({ ...payload, title });

      expect(res.status).toBe(201);
      expect(res.body.title).toBe(title);
      expect((await request(app).get(`/items/${res.body.id}`)).body.title).toBe(title);
    });

    it('returns 415 for an unsupported charset', async () => {
      const res = await request(app)
        .post('/items')
        .set('X-API-Key', API_KEY)
        .set('Content-Type', 'application/json; charset=latin1')
        .send(JSON.stringify(payload));

      expect(res.status).toBe(415);
      expect(res.body).toEqual({ error: 'unsupported charset "LATIN1"' });
      expect((await request(app).get('/items')).body).toEqual([]);
    });

    it('returns 401 without the secret', async () => {
      const res = await request(app).post('/items').send(payload);

      expect(res.status).toBe(401);
      expect(res.headers['www-authenticate']).toBe('API-Key');
      expect(res.body).toEqual({ error: 'Invalid API key' });
    });

    it('returns 401 with a wrong secret even when the payload is invalid', async () => {
      const res = await request(app)
        .post('/items')
        .set('X-API-Key', 'wrong-secret')
        .send({ title: '' });

      expect(res.status).toBe(401);
      expect((await request(app).get('/items')).body).toEqual([]);
    });

    it('returns 401 with a wrong secret even when the body is malformed', async () => {
      const res = await request(app)
        .post('/items')
        .set('X-API-Key', 'wrong-secret')
        .set('Content-Type', 'application/json')
        .send('{');

      expect(res.status).toBe(401);
    });

    it('compares the secret exactly', async () => {
      const res = await request(app)
        .post('/items')
        .set('X-API-Key', API_KEY.toUpperCase())
        .send(payload);

      expect(res.status).toBe(401);
    });
  });

  describe('GET /items/:id', () => {
    it('returns 404 for a missing id', async () => {
      const res = await request(app).get('/items/99');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'News item not found' });
    });

    it('returns 422 for a malformed id', async () => {
      const res = await request(app).get('/items/abc');

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Validation failed',
        details: [{ field: 'id', message: 'id must be a positive integer' }],
      });
    });

    it('returns 422 for an id that is not valid percent-encoding', async () => {
      const res = await request(app).get('/items/%E0');

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Validation failed',
        details: [{ field: 'id', message: 'id must be a positive integer' }],
      });
    });
  });

  describe('PUT /items/:id', () => {
    const replacement = {
      title: 'Updated',
      body: 'New body',
      date: '2024-05-30',
      category: 'Technology',
    };

    it('replaces the item', async () => {
      await create();
      const res = await request(app)
        .put('/items/1')
        .set('X-API-Key', API_KEY)
        .send(replacement);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ id: 1, ...replacement });
      expect((await request(app).get('/items/1')).body).toEqual({ id: 1, ...replacement });
    });

    it('returns 404 for a missing id and leaves the store unchanged', async () => {
      await create();
      const res = await request(app)
        .put('/items/2')
        .set('X-API-Key', API_KEY)
        .send(replacement);

      expect(res.status).toBe(404);
      expect((await request(app).get('/items')).body).toEqual([{ id: 1, ...payload }]);
    });

    it('returns 422 for a partial payload', async () => {
      await create();
      const res = await request(app)
        .put('/items/1')
        .set('X-API-Key', API_KEY)
        .send({ title: 'Only title' });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([
        { field: 'body', message: 'Required' },
        { field: 'date', message: 'Required' },
        { field: 'category', message: 'Required' },
      ]);
      expect((await request(app).get('/items/1')).body).toEqual({ id: 1, ...payload });
    });

    it('returns 401 without the secret and leaves the item unchanged', async () => {
      await create();
      const res = await request(app).put('/items/1').send(replacement);

      expect(res.status).toBe(401);
      expect((await request(app).get('/items/1')).body).toEqual({ id: 1, ...payload });
    });
  });

  describe('DELETE /items/:id', () => {
    it('deletes the item and returns 204 with an empty body', async () => {
      await create();
      const res = await request(app).delete('/items/1').set('X-API-Key', API_KEY);

      expect(res.status).toBe(204);
      expect(res.text).toBe('');
      expect((await request(app).get('/items/1')).status).toBe(404);
    });

    it('returns 404 for a missing id', async () => {
      const res = await request(app).delete('/items/7').set('X-API-Key', API_KEY);

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'News item not found' });
    });

    it('returns 401 with a wrong secret and keeps the item', async () => {
      await create();
      const res = await request(app).delete('/items/1').set('X-API-Key', 'wrong-secret');

      expect(res.status).toBe(401);
      const get = await request(app).get('/items/1');
      expect(get.status).toBe(200);
      expect(get.body).toEqual({ id: 1, ...payload });
    });

    it('checks the secret before the id', async () => {
      const res = await request(app).delete('/items/abc');

      expect(res.status).toBe(401);
    });
  });

  describe('errors', () => {
    it('returns 404 for unknown routes', async () => {
      const res = await request(app).get('/nope');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Route not found' });
    });

    it('returns 500 when the store fails', async () => {
      database.getDb().exec('DROP TABLE news_items');
      const res = await request(app).get('/items');

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: 'Internal server error' });
    });
  });

  describe('custom key header', () => {
    it('reads the secret from the configured header', async () => {
      const custom = new ApiServer(database, { ...serverConfig, apiKeyHeader: 'X-News-Key' });

      const wrongHeader = await request(custom.getApp())
        .post('/items').set('X-API-Key', API_KEY).send(payload);
      const rightHeader = await request(custom.getApp())
        .post('/items').set('X-News-Key', API_KEY).send(payload);

      expect(wrongHeader.status).toBe(401);
      expect(rightHeader.status).toBe(201);
    });
  });

  describe('CORS', () => {
    it('allows configured origins', async () => {
      const withCors = new ApiServer(database, { ...serverConfig, corsOrigins: ['http://app.test'] });
      const res = await request(withCors.getApp()).get('/items').set('Origin', 'http://app.test');

      expect(res.headers['access-control-allow-origin']).toBe('http://app.test');
    });

    it('sends no CORS headers when no origins are configured', async () => {
      const res = await request(app).get('/items').set('Origin', 'http://app.test');

      expect(res.headers['access-control-allow-origin']).toBeUndefined();
    });
  });

  describe('lifecycle', () => {
    it('starts on an ephemeral port and stops', async () => {
      await server.start();
      const port = server.getPort();
      expect(port).toBeGreaterThan(0);

      const res = await request(`http://127.0.0.1:${port}`).get('/items');
      expect(res.status).toBe(200);

      await server.stop();
      await server.stop();
    });
  });
});
