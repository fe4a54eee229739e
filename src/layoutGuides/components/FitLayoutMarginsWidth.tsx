import type { ReactNode } from 'react';

import { layoutMarginsWidthStyle, type Alignment } from '../constraintStyles';
import { useLayoutMarginsInsets } from '../LayoutGuidesContext';
import { MeasureLayoutMargins } from './MeasureLayoutMargins';

type Props = {
  alignment?: Alignment;
  children: ReactNode;
};

function InsetContent({ alignment, children }: Required<Props>) {
  const layoutMarginsInsets = useLayoutMarginsInsets();
  return (
    <div data-fit-width="layout-margins" style={layoutMarginsWidthStyle({ insets: layoutMarginsInsets, alignment })}>
      {children}
    </div>
  );
}

/** Makes its content fit the layout margins guide width. */
export function FitLayoutMarginsWidth({ alignment = 'center', children }: Props) {
  return (
    <MeasureLayoutMargins>
      <InsetContent alignment={alignment}>{children}</InsetContent>
    </MeasureLayoutMargins>
  );
}
