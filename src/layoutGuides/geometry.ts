import type { EdgeInsets } from './edgeInsets';

export type Bounds = { minX: number; minY: number; maxX: number; maxY: number };

export type TextDirection = 'ltr' | 'rtl';

export type GuideKind = 'layoutMargins' | 'readableContent';

/** One reading of a measured host element. `layoutMargins` are already direction-resolved. */
export type GeometrySnapshot = {
  bounds: Bounds;
  readableRegion: Bounds;
  layoutMargins: EdgeInsets;
  direction: TextDirection;
};

export function boundsFromRect(rect: { left: number; top: number; right: number; bottom: number }): Bounds {
  return { minX: rect.left, minY: rect.top, maxX: rect.right, maxY: rect.bottom };
}
