import { describe, expect, it } from 'vitest';

import { ConfigError } from './errors';
import { parseGameSettings } from './settings';

describe('game settings', () => {
  it('provides defaults for every section', () => {
    const settings = parseGameSettings();
    expect(settings.playfield).toEqual({ width: 800, height: 600 });
    expect(settings.physics.jumpVelocity).toBe(-12);
    expect(settings.tuning.bounceMultiplier).toBe(2);
    expect(settings.generator.validationInterval).toBe(10);
    expect(settings.camera.followRatio).toBe(0.3);
    expect(settings.scoring.milestoneBonus).toBe(100);
  });

  it('merges partial overrides', () => {
    const settings = parseGameSettings({ physics: { gravity: 0.6 }, camera: { autoScroll: true } });
    expect(settings.physics.gravity).toBe(0.6);
    expect(settings.physics.horizontalSpeed).toBe(3);
    expect(settings.camera.autoScroll).toBe(true);
  });

  it('rejects bounce multipliers that would not launch above a normal jump', () => {
    expect(() => parseGameSettings({ tuning: { bounceMultiplier: 1 } })).toThrow(ConfigError);
  });
});
