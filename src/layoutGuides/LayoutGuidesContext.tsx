import { createContext, useContext } from 'react';

import { ZERO_INSETS, type EdgeInsets } from './edgeInsets';

export type LayoutGuidesValue = {
  /** Layout margins of the nearest measuring ancestor. */
  layoutMarginsInsets: EdgeInsets;
  /** Readable content insets of the nearest measuring ancestor. */
  readableContentInsets: EdgeInsets;
  /** False outside any measuring ancestor, or when the platform has no native guides. */
  hasNativeGuides: boolean;
};

export const DEFAULT_LAYOUT_GUIDES: LayoutGuidesValue = Object.freeze({
  layoutMarginsInsets: ZERO_INSETS,
  readableContentInsets: ZERO_INSETS,
  hasNativeGuides: false
});

export const LayoutGuidesContext = createContext<LayoutGuidesValue>(DEFAULT_LAYOUT_GUIDES);

export function useLayoutGuides(): LayoutGuidesValue {
  return useContext(LayoutGuidesContext);
}

export function useLayoutMarginsInsets(): EdgeInsets {
  return useContext(LayoutGuidesContext).layoutMarginsInsets;
}

export function useReadableContentInsets(): EdgeInsets {
  return useContext(LayoutGuidesContext).readableContentInsets;
}
