import type { ReactNode } from 'react';

import { HORIZONTAL_EDGES, readableContentWidthStyle, type Alignment, type EdgeSet } from '../constraintStyles';
import { useLayoutGuidesConfig } from '../LayoutGuidesConfigContext';
import { useLayoutGuides } from '../LayoutGuidesContext';
import { MeasureLayoutMargins } from './MeasureLayoutMargins';

type Props = {
  /** Placement of `children` when they are narrower than the readable width. */
  alignment?: Alignment;
  /** Inline edges padded by the readable content insets. Top and bottom are never padded. */
  edges?: EdgeSet;
  children: ReactNode;
};

function InsetContent({ alignment, edges, children }: Required<Props>) {
  const { readableContentInsets, hasNativeGuides } = useLayoutGuides();
  const { fallbackMaxWidth } = useLayoutGuidesConfig();
  const style = readableContentWidthStyle({
    insets: readableContentInsets,
    alignment,
    edges,
    hasNativeGuides,
    fallbackMaxWidth
  });
  return (
    <div data-fit-width="readable-content" style={style}>
      {children}
    </div>
  );
}

/** Makes its content fit the readable content width. No `WithLayoutMargins` ancestor is needed. */
export function FitReadableContentWidth({ alignment = 'center', edges = HORIZONTAL_EDGES, children }: Props) {
  return (
    <MeasureLayoutMargins>
      <InsetContent alignment={alignment} edges={edges}>
        {children}
      </InsetContent>
    </MeasureLayoutMargins>
  );
}
