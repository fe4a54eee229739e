import { useLayoutEffect, useMemo, useState } from 'react';
import type { RefObject } from 'react';

import { ZERO_INSETS, type EdgeInsets } from './edgeInsets';
import { useLayoutGuidesConfig } from './LayoutGuidesConfigContext';
import type { LayoutGuidesValue } from './LayoutGuidesContext';
import { LayoutGuidesSession } from './measurementSession';

/**
 * Runs a measurement session on the referenced guide element for as long as it is mounted
 * and returns the latest published insets.
 */
export function useLayoutGuidesMeasurement(guideRef: RefObject<HTMLElement | null>): LayoutGuidesValue {
  const { guideProvider, settleIntervalMs, updateBaselineOnSuppressed } = useLayoutGuidesConfig();
  const [layoutMarginsInsets, setLayoutMarginsInsets] = useState<EdgeInsets>(ZERO_INSETS);
  const [readableContentInsets, setReadableContentInsets] = useState<EdgeInsets>(ZERO_INSETS);

  useLayoutEffect(() => {
    const element = guideRef.current;
    if (!element || !guideProvider.hasNativeGuides) return;

    const session = new LayoutGuidesSession({
      observe: (onTrigger) => guideProvider.observe(element, onTrigger),
      onLayoutMarginsChange: setLayoutMarginsInsets,
      onReadableContentChange: setReadableContentInsets,
      settleIntervalMs,
      updateBaselineOnSuppressed
    });
    session.start();
    return () => session.dispose();
  }, [guideRef, guideProvider, settleIntervalMs, updateBaselineOnSuppressed]);

  const hasNativeGuides = guideProvider.hasNativeGuides;
  return useMemo(
    () => ({ layoutMarginsInsets, readableContentInsets, hasNativeGuides }),
    [layoutMarginsInsets, readableContentInsets, hasNativeGuides]
  );
}
