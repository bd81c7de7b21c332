// tests/server.test.ts
import request from 'supertest';
import { describe, it, expect } from '@jest/globals';
import { createApp } from '../src/server';
import { fakeSource } from './helpers/fakeSource';

describe('createApp', () => {
  const app = createApp({
    openSource: async () => fakeSource([{ width: 100, height: 100, annotations: [{ content: 'Note' }] }]),
  });

  it('answers health checks', async () => {
    const res = await request(app).get('/healthz');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('mounts the comments router', async () => {
    const res = await request(app)
      .post('/comments/extract')
      .attach('file', Buffer.from('%PDF-1.7\n'), 'sheet.pdf');
    expect(res.status).toBe(200);
    expect(res.body.rows).toEqual([
      {
        page: 1,
        drawingNumber: '(unreadable)',
        comment: 'Note',
        author: '',
        modified: '',
        colorName: 'Other',
        colorHex: '(not specified)',
      },
    ]);
  });

  it('exposes the download file name to browsers', async () => {
    const res = await request(app).get('/healthz').set('Origin', 'http://localhost:3000');
    expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000');
    expect(res.headers['access-control-expose-headers']).toBe('Content-Disposition');
  });
});
