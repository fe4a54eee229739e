import type { GeometrySnapshot } from './geometry';

/**
 * What caused a re-measure. `marginsChange` only concerns the layout margins guide;
 * the other triggers only concern the readable content guide.
 */
export type GeometryTrigger = 'marginsChange' | 'layout' | 'frameChange' | 'directionChange';

export type GuideObservation = {
  /** Reads the current geometry, or `null` when the platform has no native guides. */
  snapshot: () => GeometrySnapshot | null;
  disconnect: () => void;
};

export interface GuideProvider {
  readonly hasNativeGuides: boolean;
  observe(element: HTMLElement, onTrigger: (trigger: GeometryTrigger) => void): GuideObservation;
}

const NOOP_OBSERVATION: GuideObservation = {
  snapshot: () => null,
  disconnect: () => {
    /* nothing to release */
  }
};

/** Used where the native guides are missing (server rendering, non-DOM hosts). Insets stay zero. */
export const noopGuideProvider: GuideProvider = {
  hasNativeGuides: false,
  observe: () => NOOP_OBSERVATION
};
