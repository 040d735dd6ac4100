import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ALL_TOOLS, handleToolCall } from './tools.js';
import { closeDb, initializeDb } from '../db/client.js';
import { eastwardTrack, flatTrack } from '../testing/tracks.js';

beforeEach(() => {
  vi.stubEnv('DATABASE_PATH', './does-not-exist/trailpace-test.db');
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('MCP tools', () => {
  it('lists every tool once', () => {
    const names = ALL_TOOLS.map(t => t.name);
    expect(new Set(names).size).toBe(names.length);
    expect(names).toContain('trail_plan_pacing');
  });

  it('analyzes a track', () => {
    const result = handleToolCall('trail_analyze_track', {
      name: 'Hill',
      points: eastwardTrack([200, 260, 300]),
    });
    expect(result.ok).toBe(true);
    expect(result.data).toMatchObject({ name: 'Hill', metrics: { elevation_gain_m: 100 } });
  });

  it('plans pacing from a goal string', () => {
    const result = handleToolCall('trail_plan_pacing', {
      points: flatTrack(10),
      waypoints: [{ km: 5, name: 'Mid' }],
      target: '1h00',
      fatigue_intensity: 0,
    });
    expect(result.ok).toBe(true);
    expect(result.data).toMatchObject({ target_minutes: 60, fatigue_intensity: 0 });
  });

  it('rejects an unreadable goal', () => {
    const result = handleToolCall('trail_plan_pacing', { points: flatTrack(10), target: 'soon' });
    expect(result.error?.code).toBe('INVALID_TARGET');
  });

  it('reports invalid points with their index', () => {
    const result = handleToolCall('trail_analyze_track', {
      points: [{ lat: 0, lon: 0 }, { lat: 'north', lon: 1 }],
    });
    expect(result.error?.code).toBe('INVALID_INPUT');
    expect(result.error?.details).toEqual({ index: 1 });
  });

  it('predicts on default coefficients without a store', () => {
    const result = handleToolCall('trail_predict_finish', {
      points: flatTrack(20),
      performance_index: 500,
    });
    expect(result.ok).toBe(true);
    expect(result.data).toMatchObject({ adjusted_speed_kmeh: 8, config_scope: 'inline' });
  });

  it('reads default config without a store', () => {
    const result = handleToolCall('trail_read_prediction_config', {});
    expect(result.data).toMatchObject({ scope: 'defaults', overridden_keys: [] });
  });

  it('needs a store for store tools', () => {
    expect(handleToolCall('trail_list_strategies', {}).error?.code).toBe('DB_NOT_INITIALIZED');
    expect(handleToolCall('trail_delete_strategy', { id: 'strat_x' }).error?.code).toBe('DB_NOT_INITIALIZED');
  });

  it('reports unknown tools', () => {
    expect(handleToolCall('trail_teleport', {}).error?.code).toBe('UNKNOWN_TOOL');
  });
});

describe('MCP store tools', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'trailpace-mcp-'));
    const path = join(dir, 'store.db');
    vi.stubEnv('DATABASE_PATH', path);
    initializeDb(path);
  });

  afterEach(() => {
    closeDb();
    rmSync(dir, { recursive: true, force: true });
  });

  function save(title: string): string {
    const result = handleToolCall('trail_save_strategy', {
      points: flatTrack(5),
      target: 30,
      title,
    });
    expect(result.ok).toBe(true);
    const data = result.data;
    return typeof data === 'object' && data !== null && 'strategy_id' in data ? String(data.strategy_id) : '';
  }

  it('lists at least one strategy for a negative limit', () => {
    save('First');
    save('Second');

    const listed = handleToolCall('trail_list_strategies', { limit: -1 });
    expect(Array.isArray(listed.data) && listed.data.length).toBe(1);
  });

  it('deletes a saved strategy', () => {
    const id = save('Tempo');

    expect(handleToolCall('trail_delete_strategy', { id }).data).toEqual({ id, deleted: true });
    expect(handleToolCall('trail_delete_strategy', { id }).error?.code).toBe('NOT_FOUND');
    expect(handleToolCall('trail_list_strategies', {}).data).toEqual([]);
  });

  it('needs an id to delete', () => {
    expect(handleToolCall('trail_delete_strategy', {}).error?.code).toBe('INVALID_INPUT');
  });
});
