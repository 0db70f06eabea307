import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import mongoose from 'mongoose';
import { MemoryStore } from '../db/memoryStore';
import { UnavailableStore } from '../db/unavailableStore';
import { IModule } from '../models/Module';
import { TestServer, readArray, readObject, serveStore } from '../test/testServer';

const payload = {
  title: 'Questioning Techniques',
  description: 'Open and closed questions in whole-class discussion.',
  video_url: 'https://videos.example.com/questioning.mp4',
  category: 'Instruction',
  timestamps: [
    { label: 'Intro', time: 0 },
    { label: 'Wait time', time: 42 },
  ],
  resources: [{ label: 'Question stems', url: 'https://files.example.com/stems.pdf', type: 'pdf' }],
};

const moduleRecord = (title: string): IModule => ({
  title,
  description: null,
  video_url: 'https://videos.example.com/sample.mp4',
  thumbnail_url: null,
  category: null,
  timestamps: [],
  resources: [],
});

describe('module endpoints', () => {
  let store: MemoryStore;
  let server: TestServer;

  beforeEach(async () => {
    store = new MemoryStore();
    server = await serveStore(store);
  });

  afterEach(async () => {
    await server.close();
  });

  describe('POST /api/modules', () => {
    it('creates a module that can be fetched back by its id', async () => {
      const created = await server.postJson('/api/modules', payload);
      expect(created.status).toBe(200);
      const { id } = await readObject(created);
      expect(typeof id).toBe('string');

      const fetched = await server.request(`/api/modules/${id}`);
      expect(fetched.status).toBe(200);
      expect(await readObject(fetched)).toEqual({ ...payload, thumbnail_url: null, id });
    });

    it('stores absent optional fields as null and missing lists as empty', async () => {
      const created = await server.postJson('/api/modules', {
        title: 'Minimal',
        video_url: 'http://localhost:9000/minimal.mp4',
      });
      const { id } = await readObject(created);

      const stored = await store.findById('module', String(id));
      expect(stored).toEqual({
        _id: expect.anything(),
        title: 'Minimal',
        description: null,
        video_url: 'http://localhost:9000/minimal.mp4',
        thumbnail_url: null,
        category: null,
        timestamps: [],
        resources: [],
      });
    });

    it('drops fields that are not part of a module', async () => {
      const created = await server.postJson('/api/modules', {
        ...payload,
        views: 12,
        timestamps: [{ label: 'Intro', time: 3, color: 'red' }],
      });
      const { id } = await readObject(created);

      const body = await readObject(await server.request(`/api/modules/${id}`));
      expect(body).not.toHaveProperty('views');
      expect(body.timestamps).toEqual([{ label: 'Intro', time: 3 }]);
    });

    it('rejects a module without video_url before touching the store', async () => {
      const insert = vi.spyOn(store, 'insert');
      const { video_url: _omitted, ...withoutVideo } = payload;

      const response = await server.postJson('/api/modules', withoutVideo);

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.success).toBe(false);
      expect(body.error).toBe('Validation failed');
      expect(body.details).toEqual([{ field: 'video_url', message: 'Video URL is required' }]);
      expect(insert).not.toHaveBeenCalled();
      expect(await store.count('module')).toBe(0);
    });

    it('rejects relative and non-http URLs', async () => {
      const response = await server.postJson('/api/modules', {
        ...payload,
        video_url: '/videos/questioning.mp4',
        resources: [{ label: 'Stems', url: 'ftp://files.example.com/stems.pdf' }],
      });

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.details).toEqual([
        { field: 'video_url', message: 'Video URL must be an absolute http(s) URL' },
        { field: 'resources[0].url', message: 'Resource URL must be an absolute http(s) URL' },
      ]);
    });

    it('rejects negative timestamp times and empty labels', async () => {
      const response = await server.postJson('/api/modules', {
        ...payload,
        timestamps: [{ label: '', time: -5 }],
      });

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.details).toEqual([
        { field: 'timestamps[0].label', message: 'Timestamp label cannot be empty' },
        { field: 'timestamps[0].time', message: 'Timestamp time must be a non-negative integer' },
      ]);
    });

    it('reports one error per URL field that is not a string', async () => {
      const response = await server.postJson('/api/modules', {
        ...payload,
        video_url: 42,
        thumbnail_url: 7,
        resources: [{ label: 'Stems', url: false }],
      });

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.details).toEqual([
        { field: 'video_url', message: 'Video URL must be a string' },
        { field: 'thumbnail_url', message: 'Thumbnail URL must be a string' },
        { field: 'resources[0].url', message: 'Resource URL must be a string' },
      ]);
    });

    it('rejects a title of the wrong type', async () => {
      const response = await server.postJson('/api/modules', { ...payload, title: 42 });

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.details).toEqual([{ field: 'title', message: 'Module title must be a string' }]);
    });

    it('answers 500 with the storage message when the store is down', async () => {
      const down = await serveStore(new UnavailableStore('Database is down'));
      try {
        const response = await down.postJson('/api/modules', payload);
        expect(response.status).toBe(500);
        expect(await readObject(response)).toEqual({ success: false, error: 'Database is down' });
      } finally {
        await down.close();
      }
    });
  });

  describe('GET /api/modules', () => {
    it('returns at most `limit` modules', async () => {
      for (let i = 1; i <= 5; i++) {
        await store.insert('module', moduleRecord(`Module ${i}`));
      }

      const response = await server.request('/api/modules?limit=2');
      expect(response.status).toBe(200);
      const modules = await readArray(response);
      expect(modules).toHaveLength(2);
      expect(modules).toEqual([
        expect.objectContaining({ title: 'Module 1', id: expect.any(String) }),
        expect.objectContaining({ title: 'Module 2', id: expect.any(String) }),
      ]);
    });

    it('defaults to 50 modules', async () => {
      for (let i = 1; i <= 55; i++) {
        await store.insert('module', moduleRecord(`Module ${i}`));
      }

      const modules = await readArray(await server.request('/api/modules'));
      expect(modules).toHaveLength(50);
    });

    it('never exposes _id', async () => {
      await store.insert('module', moduleRecord('Only'));

      const [module] = await readArray(await server.request('/api/modules'));
      expect(module).not.toHaveProperty('_id');
      expect(module).toHaveProperty('id');
    });

    it('rejects a limit that is not a positive integer', async () => {
      const response = await server.request('/api/modules?limit=0');

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.details).toEqual([
        { field: 'limit', message: 'Limit must be an integer between 1 and 2147483647' },
      ]);
    });

    it('rejects a limit beyond what a cursor accepts, without querying', async () => {
      const findMany = vi.spyOn(store, 'findMany');

      const response = await server.request('/api/modules?limit=99999999999999999999999');

      expect(response.status).toBe(422);
      const body = await readObject(response);
      expect(body.details).toEqual([
        { field: 'limit', message: 'Limit must be an integer between 1 and 2147483647' },
      ]);
      expect(findMany).not.toHaveBeenCalled();
    });

    it('accepts the largest allowed limit', async () => {
      await store.insert('module', moduleRecord('Only'));

      const response = await server.request('/api/modules?limit=2147483647');

      expect(response.status).toBe(200);
      expect(await readArray(response)).toHaveLength(1);
    });
  });

  describe('GET /api/modules/:id', () => {
    it('answers 400 for a malformed id', async () => {
      const response = await server.request('/api/modules/not-an-id');

      expect(response.status).toBe(400);
      expect(await readObject(response)).toEqual({
        success: false,
        error: "'not-an-id' is not a valid ObjectId, it must be a 24-character hex string",
      });
    });

    it('answers 404 for a well-formed id that does not exist', async () => {
      const id = new mongoose.Types.ObjectId().toHexString();

      const response = await server.request(`/api/modules/${id}`);

      expect(response.status).toBe(404);
      expect(await readObject(response)).toEqual({ success: false, error: 'Module not found' });
    });

    it('answers 400 when the store fails', async () => {
      const down = await serveStore(new UnavailableStore('Database is down'));
      try {
        const id = new mongoose.Types.ObjectId().toHexString();
        const response = await down.request(`/api/modules/${id}`);
        expect(response.status).toBe(400);
        expect(await readObject(response)).toEqual({ success: false, error: 'Database is down' });
      } finally {
        await down.close();
      }
    });
  });
});
