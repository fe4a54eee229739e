import type { CSSProperties, ReactNode } from 'react';

import { FitLayoutMarginsWidth, FitReadableContentWidth, WithLayoutMargins } from '../layoutGuides';

const CELL: CSSProperties = {
  width: '100%',
  boxSizing: 'border-box',
  padding: '8px 0',
  textAlign: 'center',
  background: 'rgba(0, 0, 255, 0.3)',
  border: '1px solid blue'
};

function Cell({ value }: { value: string }) {
  // Blue: fits the readable width. Red: unconstrained.
  return (
    <div style={{ border: '1px solid red' }}>
      <FitReadableContentWidth>
        <div style={CELL}>{value}</div>
      </FitReadableContentWidth>
    </div>
  );
}

function Sample({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section style={{ border: '2px solid currentColor', display: 'flex', flexDirection: 'column', minHeight: 0, flex: 1 }}>
      <FitLayoutMarginsWidth alignment="leading">
        <h2 style={{ fontSize: 20, margin: '12px 0' }}>{title}</h2>
      </FitLayoutMarginsWidth>
      <div style={{ overflow: 'auto', flex: 1 }}>{children}</div>
    </section>
  );
}

const ROWS = Array.from({ length: 30 }, (_, i) => String(i));

function ScrollSample() {
  return (
    <Sample title="Scroll">
      {ROWS.map((row) => (
        <Cell key={row} value={row} />
      ))}
    </Sample>
  );
}

function ListSample() {
  return (
    <Sample title="List">
      <ul style={{ listStyle: 'none', margin: 0, padding: 0 }}>
        {ROWS.map((row) => (
          <li key={row}>
            <Cell value={row} />
          </li>
        ))}
      </ul>
    </Sample>
  );
}

export default function DemoApp() {
  return (
    <div style={{ display: 'grid', gridTemplateColumns: 'minmax(200px, 1fr) 3fr', height: '100vh' }}>
      <div style={{ display: 'flex', flexDirection: 'column' }}>
        <ScrollSample />
        <ListSample />
      </div>
      <div style={{ display: 'flex', flexDirection: 'column' }}>
        <WithLayoutMargins>
          {(insets) => (
            <p style={{ paddingInlineStart: insets.leading, paddingInlineEnd: insets.trailing }}>
              Layout margins: {insets.leading}px / {insets.trailing}px
            </p>
          )}
        </WithLayoutMargins>
        <ScrollSample />
        <ListSample />
      </div>
    </div>
  );
}
