/**
 * API Integration Tests
 */

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../../src/api';
import { ServiceContainer } from '../../../src/services';
import { ScriptedExecutor, testConfig } from '../../helpers/fixtures';

const PAGE = { htmlSize: 2_000, hasScripts: false, obstructions: {}, priorFailures: 0 };

describe('API Endpoints', () => {
  let app: Express;
  let services: ServiceContainer;

  beforeEach(async () => {
    services = new ServiceContainer({
      executor: new ScriptedExecutor({
        'static-fetch': { success: true, elapsedMs: 300, quality: 0.9, content: '<p>article</p>' },
        'heavy-render': { success: true, elapsedMs: 4000, quality: 0.9, content: '<p>article</p>' },
      }),
      config: testConfig('unused'),
      persist: false,
    });
    await services.initialize();
    app = createApp(services);
  });

  async function scrape(body: object) {
    return request(app).post('/api/v1/scrape').send(body);
  }

  describe('GET /health', () => {
    it('should report service health', async () => {
      const response = await request(app).get('/health').expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.body.initialized).toBe(true);
    });
  });

  describe('POST /api/v1/scrape', () => {
    it('should run a strategy and return the episode', async () => {
      const response = await scrape({ url: 'https://example.test/a', features: PAGE, strategy: 'static-fetch' });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.episode.state).toBe('size=tiny|js=nojs|obs=none|retry=0');
      expect(response.body.data.episode.action).toBe('static-fetch');
      expect(response.body.data.content).toBe('<p>article</p>');
      expect(response.body.data.estimateBefore).toBe(0);
      expect(response.body.data.estimateAfter).toBeCloseTo(0.1 * (1 - 0.3 * 300 / 5300 + 0.45), 12);
    });

    it('should probe raw html when no features are given', async () => {
      const response = await scrape({
        url: 'https://example.test/b',
        html: '<html><body><div class="captcha"></div></body></html>',
      });

      expect(response.status).toBe(200);
      expect(response.body.data.episode.state).toBe('size=tiny|js=nojs|obs=captcha|retry=unknown');
    });

    it('should carry prior failures into the probed state', async () => {
      const response = await scrape({
        url: 'https://example.test/b',
        html: '<html><body><div class="captcha"></div></body></html>',
        priorFailures: 1,
      });

      expect(response.status).toBe(200);
      expect(response.body.data.episode.state).toBe('size=tiny|js=nojs|obs=captcha|retry=1');
    });

    it('should reject an invalid url', async () => {
      const response = await scrape({ url: 'not-a-url' });

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject a strategy outside the listed actions', async () => {
      const response = await scrape({
        url: 'https://example.test/c',
        strategy: 'heavy-render',
        actions: ['static-fetch'],
      });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject malformed json', async () => {
      const response = await request(app)
        .post('/api/v1/scrape')
        .set('Content-Type', 'application/json')
        .send('{"url": ');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('BAD_REQUEST');
    });
  });

  describe('POST /api/v1/scrape/recommend', () => {
    it('should recommend the best known strategy', async () => {
      await scrape({ url: 'https://example.test/d', features: PAGE, strategy: 'heavy-render' });
      await scrape({ url: 'https://example.test/d', features: PAGE, strategy: 'static-fetch' });

      const response = await request(app)
        .post('/api/v1/scrape/recommend')
        .send({ features: PAGE })
        .expect(200);

      expect(response.body.data.action).toBe('static-fetch');
      expect(response.body.data.visits).toBe(1);
    });
  });

  describe('POST /api/v1/feedback', () => {
    it('should apply a rating once', async () => {
      // Arrange
      const scraped = await scrape({ url: 'https://example.test/e', features: PAGE, strategy: 'static-fetch' });
      const episodeId: string = scraped.body.data.episode.id;

      // Act
      const first = await request(app).post('/api/v1/feedback').send({ episodeId, rating: 2, comments: 'partial' });
      const second = await request(app).post('/api/v1/feedback').send({ episodeId, rating: 5 });

      // Assert
      expect(first.status).toBe(201);
      expect(first.body.data.episodeId).toBe(episodeId);
      expect(first.body.data.rating).toBe(2);
      expect(first.body.data.delta).toBeLessThan(0);
      expect(second.status).toBe(409);
      expect(second.body.error.code).toBe('CONFLICT');
    });

    it('should return 404 for an unknown episode', async () => {
      const response = await request(app).post('/api/v1/feedback').send({ episodeId: 'ep_missing', rating: 3 });

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe('NOT_FOUND');
      expect(services.valueTable.size()).toBe(0);
    });

    it('should reject a rating outside 1 to 5', async () => {
      const response = await request(app).post('/api/v1/feedback').send({ episodeId: 'ep_any', rating: 7 });

      expect(response.status).toBe(400);
    });
  });

  describe('GET /api/v1/episodes', () => {
    it('should list recent episodes newest first and fetch one with its rating', async () => {
      const a = await scrape({ url: 'https://example.test/1', strategy: 'static-fetch' });
      const b = await scrape({ url: 'https://example.test/2', strategy: 'static-fetch' });
      await request(app).post('/api/v1/feedback').send({ episodeId: a.body.data.episode.id, rating: 4 });

      const list = await request(app).get('/api/v1/episodes?limit=5').expect(200);
      const one = await request(app).get(`/api/v1/episodes/${a.body.data.episode.id}`).expect(200);

      expect(list.body.data.total).toBe(2);
      expect(list.body.data.episodes.map((episode: { id: string }) => episode.id))
        .toEqual([b.body.data.episode.id, a.body.data.episode.id]);
      expect(one.body.data.feedback.rating).toBe(4);
    });

    it('should return 404 for an unknown episode', async () => {
      const response = await request(app).get('/api/v1/episodes/ep_missing');

      expect(response.status).toBe(404);
    });

    it('should reject a limit out of range', async () => {
      const response = await request(app).get('/api/v1/episodes?limit=0');

      expect(response.status).toBe(400);
    });
  });

  describe('GET /api/v1/policy and /api/v1/stats', () => {
    it('should expose the learned policy and aggregate stats', async () => {
      await scrape({ url: 'https://example.test/f', features: PAGE, strategy: 'static-fetch' });

      const policy = await request(app).get('/api/v1/policy').expect(200);
      const stats = await request(app).get('/api/v1/stats').expect(200);

      expect(policy.body.data.actions).toEqual(['heavy-render', 'light-render', 'wait-render', 'static-fetch']);
      expect(policy.body.data.states).toHaveLength(1);
      expect(policy.body.data.states[0].best).toBe('static-fetch');
      expect(policy.body.data.states[0].buckets).toEqual({ size: 'tiny', js: 'nojs', obs: 'none', retry: '0' });
      expect(stats.body.data.totalScrapes).toBe(1);
      expect(stats.body.data.successRate).toBe(1);
      expect(stats.body.data.valueTableSize).toBe(1);
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await request(app).get('/api/v1/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body.error.code).toBe('NOT_FOUND');
  });
});
