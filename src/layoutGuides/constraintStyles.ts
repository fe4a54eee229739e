import type { CSSProperties } from 'react';

import type { EdgeInsets } from './edgeInsets';

/** Horizontal placement of content narrower than the available width. */
export type Alignment = 'leading' | 'center' | 'trailing';

/** Width constraints only ever pad the inline edges. */
export type HorizontalEdge = 'leading' | 'trailing';

export type EdgeSet = ReadonlyArray<HorizontalEdge>;

export const HORIZONTAL_EDGES: EdgeSet = ['leading', 'trailing'];

// Column flex: the cross axis is the inline axis, so flex-start follows the text direction.
const ALIGN_ITEMS: Record<Alignment, CSSProperties['alignItems']> = {
  leading: 'flex-start',
  center: 'center',
  trailing: 'flex-end'
};

function alignedColumn(alignment: Alignment): CSSProperties {
  return {
    display: 'flex',
    flexDirection: 'column',
    alignItems: ALIGN_ITEMS[alignment],
    boxSizing: 'border-box',
    width: '100%'
  };
}

export function readableContentWidthStyle({
  insets,
  alignment,
  edges,
  hasNativeGuides,
  fallbackMaxWidth
}: {
  insets: EdgeInsets;
  alignment: Alignment;
  edges: EdgeSet;
  hasNativeGuides: boolean;
  fallbackMaxWidth: number;
}): CSSProperties {
  if (!hasNativeGuides) {
    return { ...alignedColumn(alignment), maxWidth: fallbackMaxWidth, marginInlineStart: 'auto', marginInlineEnd: 'auto' };
  }
  const pad = (edge: HorizontalEdge) => (edges.includes(edge) ? insets[edge] : 0);
  return {
    ...alignedColumn(alignment),
    paddingInlineStart: pad('leading'),
    paddingInlineEnd: pad('trailing')
  };
}

export function layoutMarginsWidthStyle({ insets, alignment }: { insets: EdgeInsets; alignment: Alignment }): CSSProperties {
  return {
    ...alignedColumn(alignment),
    paddingInlineStart: insets.leading,
    paddingInlineEnd: insets.trailing
  };
}

/** The invisible element the guide provider measures; its padding is the layout margins. */
export function guideElementStyle(defaultLayoutMargin: number): CSSProperties {
  return {
    position: 'absolute',
    inset: 0,
    boxSizing: 'border-box',
    visibility: 'hidden',
    pointerEvents: 'none',
    paddingTop: 'env(safe-area-inset-top, 0px)',
    paddingBottom: 'env(safe-area-inset-bottom, 0px)',
    paddingLeft: `max(${defaultLayoutMargin}px, env(safe-area-inset-left, 0px))`,
    paddingRight: `max(${defaultLayoutMargin}px, env(safe-area-inset-right, 0px))`
  };
}
