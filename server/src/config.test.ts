import path from 'path';
import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from './config.js';
import { loadTipCorpus, parseTipCorpus } from './tips.js';

const dataDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '../data');

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      port: 8787,
      dbPath: path.resolve('server/data/planner.db'),
      tipsPath: path.resolve('server/data/tips.json'),
      overageEpsilon: 1,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '3000',
      PLANNER_DB_PATH: '/tmp/planner-test.db',
      PLANNER_TIPS_PATH: '/tmp/tips.json',
      PLANNER_OVERAGE_EPSILON_CENTS: '5',
    });
    expect(config).toEqual({
      port: 3000,
      dbPath: '/tmp/planner-test.db',
      tipsPath: '/tmp/tips.json',
      overageEpsilon: 5,
    });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '  ' }).port).toBe(8787);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow(ZodError);
    expect(() => loadConfig({ PORT: '70000' })).toThrow(ZodError);
    expect(() => loadConfig({ PLANNER_OVERAGE_EPSILON_CENTS: '-1' })).toThrow(ZodError);
    expect(() => loadConfig({ PLANNER_OVERAGE_EPSILON_CENTS: '0.5' })).toThrow(ZodError);
  });
});

describe('tip corpus', () => {
  it('loads the bundled tips', () => {
    const tips = loadTipCorpus(path.join(dataDir, 'tips.json'));
    expect(tips).toHaveLength(14);
    expect(tips[0].id).toBe('tip-fondo-emergencia');
  });

  it('rejects unknown levels, empty tag lists and duplicate ids', () => {
    const tip = { id: 'a', title: 'A', explanation: 'x', incomeLevels: ['Todos'], conditions: ['Sin deudas'] };
    expect(() => parseTipCorpus([{ ...tip, incomeLevels: ['Nivel 9'] }])).toThrow(ZodError);
    expect(() => parseTipCorpus([{ ...tip, conditions: [] }])).toThrow(ZodError);
    expect(() => parseTipCorpus([tip, tip])).toThrow(ZodError);
    expect(parseTipCorpus([tip])).toEqual([tip]);
  });
});
