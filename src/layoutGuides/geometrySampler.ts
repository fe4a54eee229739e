import { createEdgeInsets, type EdgeInsets } from './edgeInsets';
import type { Bounds, GeometrySnapshot, TextDirection } from './geometry';

export function sampleLayoutMargins(snapshot: Pick<GeometrySnapshot, 'layoutMargins'>): EdgeInsets {
  return createEdgeInsets(snapshot.layoutMargins);
}

/**
 * Converts the readable region into insets relative to the host bounds.
 *
 * Physical left/right insets are mapped onto leading/trailing so callers can pad
 * the side where reading starts without knowing the text direction.
 * Bottom and right are written as `bounds - region` so that coincident edges give +0.
 */
export function sampleReadableContentInsets({
  bounds,
  readableRegion,
  direction
}: {
  bounds: Bounds;
  readableRegion: Bounds;
  direction: TextDirection;
}): EdgeInsets {
  const left = readableRegion.minX - bounds.minX;
  const right = bounds.maxX - readableRegion.maxX;
  const isRightToLeft = direction === 'rtl';
  return createEdgeInsets({
    top: readableRegion.minY - bounds.minY,
    leading: isRightToLeft ? right : left,
    bottom: bounds.maxY - readableRegion.maxY,
    trailing: isRightToLeft ? left : right
  });
}
