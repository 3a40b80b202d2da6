import { parseNumber, resolveBooleanFlag } from '..';

describe('Configuration', () => {
  describe('parseNumber', () => {
    it('falls back for missing or non-numeric values', () => {
      expect(parseNumber(undefined, 3600)).toBe(3600);
      expect(parseNumber('', 3600)).toBe(3600);
      expect(parseNumber('soon', 3600)).toBe(3600);
      expect(parseNumber('900', 3600)).toBe(900);
    });
  });

  describe('resolveBooleanFlag', () => {
    it('lets the enable key win over the disable key', () => {
      expect(resolveBooleanFlag('true', 'true', false)).toBe(true);
      expect(resolveBooleanFlag('false', undefined, true)).toBe(false);
      expect(resolveBooleanFlag(undefined, 'true', true)).toBe(false);
      expect(resolveBooleanFlag(undefined, undefined, true)).toBe(true);
    });
  });

  describe('environment', () => {
    const originalEnv = process.env;

    beforeEach(() => {
      jest.resetModules();
      process.env = { ...originalEnv };
    });

    afterAll(() => {
      process.env = originalEnv;
    });

    it('reads leg and source settings from the environment', async () => {
      process.env.LEG_GAP_THRESHOLD_SECONDS = '900';
      process.env.ENABLE_GROUND_FILTER = 'true';
      process.env.DISPLAY_TIMEZONE = 'America/Los_Angeles';
      process.env.TRACE_HISTORY_BASE_URL = 'https://mirror.example.test/history';
      process.env.TRACE_FETCH_CONCURRENCY = '0';

      const config = (await import('..')).default;

      expect(config.legs).toEqual({ gapThresholdSeconds: 900, filterGround: true });
      expect(config.display.timeZone).toBe('America/Los_Angeles');
      expect(config.source.historyBaseUrl).toBe('https://mirror.example.test/history/');
      expect(config.source.concurrency).toBe(1);
    });

    it('uses the documented defaults', async () => {
      delete process.env.LEG_GAP_THRESHOLD_SECONDS;
      delete process.env.ENABLE_GROUND_FILTER;
      delete process.env.DISABLE_GROUND_FILTER;
      delete process.env.DISPLAY_TIMEZONE;
      delete process.env.TRACE_RECENT_BASE_URL;
      delete process.env.TRACE_FETCH_CONCURRENCY;

      const config = (await import('..')).default;

      expect(config.legs).toEqual({ gapThresholdSeconds: 3600, filterGround: false });
      expect(config.display.timeZone).toBe('UTC');
      expect(config.source.recentBaseUrl).toBe('https://globe.adsbexchange.com/data/');
      expect(config.source.concurrency).toBe(4);
    });
  });
});
