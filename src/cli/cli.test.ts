import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseAssignments } from './config.js';
import { loadTrackFile, loadWaypointsFile } from './input.js';

describe('parseAssignments', () => {
  it('splits key=value pairs', () => {
    expect(parseAssignments(['base_speed_slope=0.03', ' decay_start_km = 50'])).toEqual({
      values: { base_speed_slope: '0.03', decay_start_km: '50' },
      invalid: [],
    });
  });

  it('collects malformed pairs', () => {
    expect(parseAssignments(['=1', 'push_multiplier', 'min_speed_kmeh='])).toEqual({
      values: {},
      invalid: ['=1', 'push_multiplier', 'min_speed_kmeh='],
    });
  });
});

describe('track files', () => {
  let dir: string | null = null;

  const write = (name: string, content: string): string => {
    const base = dir ?? mkdtempSync(join(tmpdir(), 'trailpace-'));
    dir = base;
    const path = join(base, name);
    writeFileSync(path, content);
    return path;
  };

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it('names unnamed tracks after the file', () => {
    const path = write('col-loop.json', JSON.stringify([{ lat: 45, lon: 6 }, { lat: 45.01, lon: 6 }]));
    const track = loadTrackFile(path);
    expect(track.name).toBe('col-loop');
    expect(track.points).toHaveLength(2);
  });

  it('keeps the name from the file content', () => {
    const path = write('t.json', JSON.stringify({ name: 'Summit push', points: [] }));
    expect(loadTrackFile(path).name).toBe('Summit push');
  });

  it('reports invalid JSON', () => {
    const path = write('broken.json', '{ "points": [');
    expect(() => loadTrackFile(path)).toThrow(/broken\.json is not valid JSON/);
  });

  it('reads waypoint files', () => {
    const path = write('aid.json', JSON.stringify([{ km: 8, name: 'Hut', kind: 'food' }]));
    expect(loadWaypointsFile(path)).toEqual([{ km: 8, name: 'Hut', kind: 'food', lat: null, lon: null }]);
  });
});
