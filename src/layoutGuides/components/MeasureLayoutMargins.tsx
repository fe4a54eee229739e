import { useRef } from 'react';
import type { CSSProperties, ReactNode } from 'react';

import { guideElementStyle } from '../constraintStyles';
import { useLayoutGuidesConfig } from '../LayoutGuidesConfigContext';
import { LayoutGuidesContext } from '../LayoutGuidesContext';
import { useLayoutGuidesMeasurement } from '../useLayoutGuidesMeasurement';

type Props = {
  children: ReactNode;
  className?: string;
  style?: CSSProperties;
};

/**
 * Measures its own box and provides `layoutMarginsInsets` / `readableContentInsets`
 * to everything rendered inside it.
 */
export function MeasureLayoutMargins({ children, className, style }: Props) {
  const { defaultLayoutMargin } = useLayoutGuidesConfig();
  const guideRef = useRef<HTMLDivElement | null>(null);
  const guides = useLayoutGuidesMeasurement(guideRef);

  return (
    <div className={className} style={{ position: 'relative', ...style }}>
      <div ref={guideRef} aria-hidden="true" data-layout-guide="" style={guideElementStyle(defaultLayoutMargin)} />
      <LayoutGuidesContext.Provider value={guides}>{children}</LayoutGuidesContext.Provider>
    </div>
  );
}
