import request from 'supertest';
import type { Express } from 'express';
import { LinkHttpServer, escapeHtml, renderSuccessPage } from '../../src/index.js';

describe('Success and health routes', () => {
  let app: Express;

  beforeEach(() => {
    const handler = { handle: vi.fn() };
    app = new LinkHttpServer(handler, {
      port: 0,
      host: '127.0.0.1',
      successUrl: '/success',
      storage: { sessions: 'memory', linkages: 'memory' }
    }).getApp();
  });

  describe('GET /success', () => {
    it('names the linked account', async () => {
      const response = await request(app)
        .get('/success?success=true&rbx=nova&dc=Requester')
        .expect(200)
        .expect('Content-Type', /text\/html/);

      expect(response.text).toContain('Linked <strong>nova</strong>.');
    });

    it('escapes the display name', async () => {
      const response = await request(app)
        .get('/success?rbx=%3Cscript%3Ealert(1)%3C%2Fscript%3E')
        .expect(200);

      expect(response.text).toContain('Linked <strong>&lt;script&gt;alert(1)&lt;/script&gt;</strong>.');
    });

    it('falls back to a generic message without a name', async () => {
      const response = await request(app).get('/success').expect(200);

      expect(response.text).toContain('Linked your account.');
    });
  });

  describe('GET /health', () => {
    it('returns healthy status', async () => {
      const response = await request(app)
        .get('/health')
        .expect(200)
        .expect('Content-Type', /application\/json/);

      expect(response.body).toMatchObject({
        status: 'healthy',
        service: 'account-link',
        environment: 'test',
        storage: { sessions: 'memory', linkages: 'memory' }
      });
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  it('answers unknown paths with 404', async () => {
    await request(app).get('/nowhere').expect(404);
  });

  describe('escapeHtml', () => {
    it('escapes markup characters', () => {
      expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
    });
  });

  describe('renderSuccessPage', () => {
    it('produces a complete document', () => {
      const html = renderSuccessPage('nova');

      expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
      expect(html).toContain('<title>Account linked</title>');
    });
  });
});

describe('LinkHttpServer lifecycle', () => {
  it('runs the stop hook even when never started', async () => {
    const onStop = vi.fn<() => Promise<void>>().mockResolvedValue(undefined);
    const server = new LinkHttpServer({ handle: vi.fn() }, {
      port: 0,
      host: '127.0.0.1',
      successUrl: '/success',
      onStop
    });

    await server.stop();

    expect(onStop).toHaveBeenCalledTimes(1);
  });

  it('starts and stops on an ephemeral port', async () => {
    const server = new LinkHttpServer({ handle: vi.fn() }, { port: 0, host: '127.0.0.1', successUrl: '/success' });

    await server.start();
    await server.stop();
  });
});
