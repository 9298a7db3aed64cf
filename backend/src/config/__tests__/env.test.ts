/**
 * Environment Config Tests
 */

import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {

  it('applies defaults for an empty environment', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 3001,
      HOST: '0.0.0.0',
      LOG_LEVEL: 'info',
      CORS_ORIGINS: '*',
      GRAPH_LAYOUT_SEED: 42,
      GRAPH_TOP_N: 10,
      GRAPH_LOAD_SAMPLE: true,
      GRAPH_SAMPLE_PATH: 'backend/data/sample-universe.json',
    });
  });

  it('coerces numbers and boolean flags', () => {
    const env = parseEnv({ PORT: '8080', GRAPH_TOP_N: '25', GRAPH_LOAD_SAMPLE: '0', GRAPH_LAYOUT_SEED: '7' });
    expect(env.PORT).toBe(8080);
    expect(env.GRAPH_TOP_N).toBe(25);
    expect(env.GRAPH_LOAD_SAMPLE).toBe(false);
    expect(env.GRAPH_LAYOUT_SEED).toBe(7);
  });

  it('rejects invalid values', () => {
    expect(() => parseEnv({ LOG_LEVEL: 'loud' })).toThrow();
    expect(() => parseEnv({ GRAPH_TOP_N: '0' })).toThrow();
    expect(() => parseEnv({ GRAPH_LOAD_SAMPLE: 'maybe' })).toThrow();
  });
});
