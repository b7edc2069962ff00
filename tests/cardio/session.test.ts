import { describe, expect, it } from 'vitest';

import { RenderSession, defaultPreviewDay, previewDayKey } from '@/lib/cardio/session';

const SMALL = { width: 60, height: 45 };

describe('preview keys', () => {
  it('snaps to the nearest half day', () => {
    expect(previewDayKey(3.2)).toBe(3);
    expect(previewDayKey(3.26)).toBe(3.5);
    expect(previewDayKey(7.9)).toBe(8);
  });

  it('defaults to the middle of the selected range', () => {
    expect(defaultPreviewDay([1, 8])).toBe(4.5);
    expect(defaultPreviewDay([1, 3])).toBe(2);
    expect(defaultPreviewDay([6, 8])).toBe(7);
  });
});

describe('RenderSession', () => {
  it('serves repeated preview keys from its cache', () => {
    const session = new RenderSession({ seed: 3, config: SMALL });
    const first = session.renderPreview(3.3);
    const second = session.renderPreview(3.4);
    expect(first.dayKey).toBe(3.5);
    expect(first.cached).toBe(false);
    expect(second.cached).toBe(true);
    expect(second.frame.pixels).toEqual(first.frame.pixels);
    expect(second.frame.title).toBe(first.frame.title);
    expect(session.previews.size).toBe(1);
  });

  it('keeps cached previews intact when a caller writes to the returned pixels', () => {
    const session = new RenderSession({ seed: 3, config: SMALL });
    const first = session.renderPreview(3);
    const original = first.frame.pixels.slice();
    first.frame.pixels.fill(0);

    const again = session.renderPreview(3);
    expect(again.cached).toBe(true);
    expect(again.frame.pixels[0]).toBe(original[0]);
    expect(again.frame.pixels).toEqual(original);
  });

  it('never snaps a valid day below day 1 with a coarse preview step', () => {
    expect(previewDayKey(1, 3)).toBe(1);
    const session = new RenderSession({ seed: 1, config: { ...SMALL, previewStep: 3 } });
    const result = session.renderPreview(1);
    expect(result.dayKey).toBe(1);
    expect(result.frame.title).toBe('Immature Stage');
  });

  it('recomposes every time with caching disabled', () => {
    const session = new RenderSession({ seed: 3, config: SMALL, cachePreviews: false });
    const first = session.renderPreview(5);
    const second = session.renderPreview(5);
    expect(second.cached).toBe(false);
    expect(second.frame).not.toBe(first.frame);
    expect(session.previews.size).toBe(0);
  });

  it('rejects preview days before day 1', () => {
    const session = new RenderSession({ config: SMALL });
    expect(() => session.renderPreview(0.2)).toThrow(RangeError);
  });

  it('replaces the previous animation on each generate', () => {
    const session = new RenderSession({ seed: 'gen', config: SMALL });
    expect(session.latestArtifact).toBeNull();
    const a = session.generate({ dayRange: [1, 3], speed: 'fast' });
    const b = session.generate({ dayRange: [6, 8], speed: 'slow' });
    expect(session.latestArtifact).toBe(b);
    expect(a.frameDurationMs).toBe(125);
    expect(b.frameDurationMs).toBe(500);
    expect(b.frames[0].title).toBe('Peak Contraction Activity');
  });

  it('falls back to default settings for unusable config values', () => {
    const session = new RenderSession({ config: { width: -5, height: Number.NaN, frameDurationMs: { fast: 80 } } });
    expect(session.config.width).toBe(400);
    expect(session.config.height).toBe(300);
    expect(session.config.frameDurationMs).toEqual({ slow: 500, medium: 250, fast: 80 });
  });
});
