import type { ReactNode } from 'react';

import type { EdgeInsets } from '../edgeInsets';
import { useLayoutMarginsInsets } from '../LayoutGuidesContext';
import { MeasureLayoutMargins } from './MeasureLayoutMargins';

type Content = ReactNode | ((layoutMarginsInsets: EdgeInsets) => ReactNode);

function InsetContent({ content }: { content: Content }) {
  const layoutMarginsInsets = useLayoutMarginsInsets();
  return <>{typeof content === 'function' ? content(layoutMarginsInsets) : content}</>;
}

/**
 * Measures the layout guides for its children. A function child receives the layout
 * margins directly; plain children can read them with `useLayoutMarginsInsets()`.
 */
export function WithLayoutMargins({ children }: { children: Content }) {
  return (
    <MeasureLayoutMargins>
      <InsetContent content={children} />
    </MeasureLayoutMargins>
  );
}
