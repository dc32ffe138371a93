/**
 * ServiceContainer Tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ServiceContainer } from '../../../src/services';
import { CONFIG } from '../../../src/utils/config';
import { ConfigurationError } from '../../../src/utils/errors';
import { ScriptedExecutor, SMALL_PAGE, makeTempDir, removeDir, testConfig } from '../../helpers/fixtures';

const executor = () => new ScriptedExecutor({
  'static-fetch': { success: true, elapsedMs: 300, quality: 0.9 },
  'heavy-render': { success: true, elapsedMs: 4000, quality: 0.9 },
});

describe('ServiceContainer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should start fresh when nothing is stored', async () => {
    const services = new ServiceContainer({ executor: executor(), config: testConfig(dir) });

    const report = await services.initialize();

    expect(report.valueTable?.status).toBe('missing');
    expect(report.episodeLog?.status).toBe('missing');
    expect(services.isInitialized()).toBe(true);
  });

  it('should only load once', async () => {
    const services = new ServiceContainer({ executor: executor(), config: testConfig(dir) });
    await services.initialize();

    await expect(services.initialize()).resolves.toEqual({ valueTable: null, episodeLog: null });
  });

  it('should carry learned values and episodes across restarts', async () => {
    // Arrange
    const first = new ServiceContainer({ executor: executor(), config: testConfig(dir) });
    await first.initialize();
    const { episode } = await first.policyEngine.scrape({
      url: 'https://example.test/a',
      features: SMALL_PAGE,
      strategy: 'static-fetch',
    });
    await first.applyFeedback({ episodeId: episode.id, rating: 5 });
    await first.shutdown();

    // Act
    const second = new ServiceContainer({ executor: executor(), config: testConfig(dir) });
    const report = await second.initialize();

    // Assert
    expect(report.valueTable?.status).toBe('loaded');
    expect(report.episodeLog?.status).toBe('loaded');
    expect(second.valueTable.snapshot()).toEqual(first.valueTable.snapshot());
    expect(second.episodeLog.get(episode.id)).toEqual(episode);
    expect(second.episodeLog.feedbackFor(episode.id)?.rating).toBe(5);
    expect(second.policyEngine.recommend(SMALL_PAGE).action).toBe('static-fetch');
  });

  it('should not overwrite stored state when saving before initialization', async () => {
    // Arrange
    const first = new ServiceContainer({ executor: executor(), config: testConfig(dir) });
    await first.initialize();
    await first.policyEngine.scrape({ url: 'https://example.test/a', features: SMALL_PAGE, strategy: 'static-fetch' });
    await first.policyEngine.scrape({ url: 'https://example.test/b', features: SMALL_PAGE, strategy: 'heavy-render' });
    await first.shutdown();

    // Act
    const early = new ServiceContainer({ executor: executor(), config: testConfig(dir) });
    await early.policyEngine.scrape({ url: 'https://example.test/c', features: SMALL_PAGE, strategy: 'static-fetch' });
    await early.shutdown();

    // Assert
    const reloaded = new ServiceContainer({ executor: executor(), config: testConfig(dir) });
    await reloaded.initialize();
    expect(reloaded.episodeLog.size()).toBe(2);
    expect(reloaded.valueTable.snapshot()).toEqual(first.valueTable.snapshot());
  });

  it('should reject an out-of-range config passed in directly', () => {
    const config = { ...testConfig(dir), rl: { ...CONFIG.rl, epsilon: 2 } };

    expect(() => new ServiceContainer({ executor: executor(), config, persist: false })).toThrow(ConfigurationError);
  });

  it('should start empty with a warning when the table file is corrupt', async () => {
    await fs.writeFile(path.join(dir, 'value-table.json'), '[1, 2', 'utf-8');
    const services = new ServiceContainer({ executor: executor(), config: testConfig(dir) });

    const report = await services.initialize();

    expect(report.valueTable?.status).toBe('corrupt');
    expect(report.valueTable?.warning).toBeDefined();
    expect(services.valueTable.size()).toBe(0);
  });

  it('should keep everything in memory when persistence is off', async () => {
    const services = new ServiceContainer({ executor: executor(), config: testConfig(dir), persist: false });
    await services.initialize();

    await services.policyEngine.scrape({ url: 'https://example.test/b', strategy: 'static-fetch' });
    await services.shutdown();

    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('should expose the current exploration rate', () => {
    const services = new ServiceContainer({
      executor: executor(),
      config: testConfig(dir, { epsilon: 0.3 }),
      persist: false,
    });

    expect(services.getExplorationRate()).toBe(0.3);
  });
});
