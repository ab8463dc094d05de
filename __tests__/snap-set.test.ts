import { SnapSet } from '@/components/sheet/snapSet';
import { createResolver, fixedSize, fullSize, halfSize } from '@/components/sheet/sizeSpec';

const resolver = createResolver({ availableExtent: 840, topInset: 0, bottomInset: 0 }, 'bottom');

describe('SnapSet', () => {
  it('orders sizes by resolved height', () => {
    const set = SnapSet.create([fullSize(), fixedSize(300), halfSize()], resolver);
    expect(set.heights()).toEqual([300, 444, 800]);
    expect(set.sizes.map(size => size.kind)).toEqual(['fixed', 'proportional', 'full']);
    expect(set.first).toEqual({ kind: 'fixed', height: 300 });
    expect(set.last).toEqual({ kind: 'full' });
    expect(set.minHeight).toBe(300);
    expect(set.maxHeight).toBe(800);
  });

  it('falls back to the default sizes when given none', () => {
    const set = SnapSet.create([], resolver);
    expect(set.length).toBe(2);
    expect(set.heights()).toEqual([300, 800]);
  });

  it('keeps input order for equal heights', () => {
    const tall = fixedSize(900);
    const full = fullSize();
    const set = SnapSet.create([tall, full, fixedSize(300)], resolver);
    expect(set.heights()).toEqual([300, 800, 800]);
    expect(set.sizes[1]).toBe(tall);
    expect(set.sizes[2]).toBe(full);
  });

  it('re-sorts when the layout changes', () => {
    const half = halfSize();
    const set = SnapSet.create([fixedSize(300), half], resolver);
    expect(set.first.kind).toBe('fixed');

    const narrow = set.relayout(createResolver({ availableExtent: 400, topInset: 0, bottomInset: 0 }, 'bottom'));
    expect(narrow.heights()).toEqual([224, 300]);
    expect(narrow.first).toBe(half);
  });

  describe('pickGrowing', () => {
    const set = SnapSet.create([fixedSize(300), halfSize(), fullSize()], resolver);

    it('picks the nearest size at or above the release height', () => {
      expect(set.pickGrowing(500)).toEqual({ kind: 'full' });
      expect(set.pickGrowing(400)).toEqual({ kind: 'proportional', fraction: 0.5 });
    });

    it('settles on an exact match', () => {
      expect(set.pickGrowing(444)).toEqual({ kind: 'proportional', fraction: 0.5 });
      expect(set.pickGrowing(300)).toEqual({ kind: 'fixed', height: 300 });
    });

    it('falls back to the largest size past the top', () => {
      expect(set.pickGrowing(900)).toEqual({ kind: 'full' });
    });
  });

  describe('pickShrinking', () => {
    const set = SnapSet.create([fixedSize(300), halfSize(), fullSize()], resolver);

    it('picks the nearest size at or below the release height', () => {
      expect(set.pickShrinking(500)).toEqual({ kind: 'proportional', fraction: 0.5 });
      expect(set.pickShrinking(700)).toEqual({ kind: 'proportional', fraction: 0.5 });
    });

    it('settles on an exact match', () => {
      expect(set.pickShrinking(444)).toEqual({ kind: 'proportional', fraction: 0.5 });
      expect(set.pickShrinking(800)).toEqual({ kind: 'full' });
    });

    it('falls back to the smallest size below the bottom', () => {
      expect(set.pickShrinking(100)).toEqual({ kind: 'fixed', height: 300 });
    });
  });
});
