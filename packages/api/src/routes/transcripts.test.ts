import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createFileTranscriptStore } from '@searchwise/core/src/session/file-transcript-store.js';
import { createTestApp, jsonPost } from '../test-helpers.js';

const transcript = [
  { role: 'user', content: '今日の天気は？', timestamp: '2024-05-01T09:00:00.000Z' },
  { role: 'assistant', content: '晴れです。', timestamp: '2024-05-01T09:00:02.000Z' },
];

describe('Transcript Routes', () => {
  it('should save, list and load a transcript', async () => {
    const app = createTestApp();

    const saved = await app.request('/transcripts', jsonPost({ transcript, name: 'morning.json' }));
    expect(saved.status).toBe(201);
    expect(await saved.json()).toEqual({ name: 'morning.json', messageCount: 2 });

    const listed = await app.request('/transcripts');
    expect(await listed.json()).toEqual({ names: ['morning.json'] });

    const loaded = await app.request('/transcripts/morning.json');
    expect(loaded.status).toBe(200);
    expect(await loaded.json()).toEqual({ name: 'morning.json', transcript });
  });

  it('should generate a name when none is given', async () => {
    const app = createTestApp();

    const res = await app.request('/transcripts', jsonPost({ transcript }));

    const body = (await res.json()) as { name: string };
    expect(body.name).toMatch(/^chat_history_\d{8}_\d{6}\.json$/);
  });

  it('should return 404 for an unknown transcript', async () => {
    const app = createTestApp();

    const res = await app.request('/transcripts/missing.json');

    expect(res.status).toBe(404);
    const body = (await res.json()) as { code: string };
    expect(body.code).toBe('TRANSCRIPT_NOT_FOUND');
  });

  it('should return 400 for a transcript with a bad timestamp', async () => {
    const app = createTestApp();

    const res = await app.request(
      '/transcripts',
      jsonPost({ transcript: [{ role: 'user', content: 'x', timestamp: 'yesterday' }] }),
    );

    expect(res.status).toBe(400);
  });

  describe('with the file store', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(tmpdir(), 'searchwise-api-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('should return 400 for a name that leaves the directory', async () => {
      const app = createTestApp({ transcriptStore: createFileTranscriptStore({ directory }) });

      const res = await app.request('/transcripts', jsonPost({ transcript, name: '../escape.json' }));

      expect(res.status).toBe(400);
      const body = (await res.json()) as { code: string };
      expect(body.code).toBe('INVALID_TRANSCRIPT_NAME');
    });
  });
});
