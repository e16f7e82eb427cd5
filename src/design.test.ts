import { describe, expect, it } from 'vitest';
import { designHeight, designSurfaceFromConfig } from './design';
import { resolveGradingConfig } from './config';

const pad = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 },
];

describe('designHeight', () => {
  it('holds pad elevation inside the outline', () => {
    expect(designHeight(5, 5, { padElevationFt: 100, padOutline: pad, sideSlopePercent: 10 })).toBe(100);
  });

  it('falls away from the nearest pad edge', () => {
    const surface = { padElevationFt: 100, padOutline: pad, sideSlopePercent: 10 };
    expect(designHeight(20, 5, surface)).toBeCloseTo(99, 9);
    expect(designHeight(5, -30, surface)).toBeCloseTo(97, 9);
  });

  it('is flat without an outline', () => {
    expect(designHeight(500, -500, { padElevationFt: 42, sideSlopePercent: 10 })).toBe(42);
  });
});

describe('designSurfaceFromConfig', () => {
  it('needs a target elevation', () => {
    expect(designSurfaceFromConfig(resolveGradingConfig())).toBeNull();
  });

  it('takes the outline and side slope from configuration', () => {
    const surface = designSurfaceFromConfig(
      resolveGradingConfig({ targetElevationFt: 80, padOutline: pad, defaultSlopePercent: 2 })
    );
    expect(surface).toEqual({ padElevationFt: 80, padOutline: pad, sideSlopePercent: 2 });
  });
});
