import { createEdgeInsets, type EdgeInsets } from './edgeInsets';
import { LayoutGuidesSession, guideForTrigger } from './measurementSession';
import { makeFakeGuideProvider, makeSnapshot, type FakeGuideProvider } from '../test/builders/guideProviderBuilders';

const bounds = { minX: 0, minY: 0, maxX: 1000, maxY: 400 };

function startSession(provider: FakeGuideProvider, updateBaselineOnSuppressed = true) {
  const margins: EdgeInsets[] = [];
  const readable: EdgeInsets[] = [];
  const element = document.createElement('div');
  const session = new LayoutGuidesSession({
    observe: (onTrigger) => provider.observe(element, onTrigger),
    onLayoutMarginsChange: (insets) => margins.push(insets),
    onReadableContentChange: (insets) => readable.push(insets),
    settleIntervalMs: 10,
    updateBaselineOnSuppressed
  });
  session.start();
  return { session, margins, readable, element };
}

describe('LayoutGuidesSession', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('maps triggers onto guides', () => {
    expect(guideForTrigger('marginsChange')).toBe('layoutMargins');
    expect(guideForTrigger('layout')).toBe('readableContent');
    expect(guideForTrigger('frameChange')).toBe('readableContent');
    expect(guideForTrigger('directionChange')).toBe('readableContent');
  });

  test('publishes both guides immediately on start', () => {
    const provider = makeFakeGuideProvider(
      makeSnapshot({
        bounds,
        readableRegion: { minX: 164, minY: 0, maxX: 836, maxY: 400 },
        layoutMargins: { leading: 20, trailing: 20 }
      })
    );
    const { margins, readable, element } = startSession(provider);

    expect(provider.observedElements).toEqual([element]);
    expect(margins).toEqual([{ top: 0, leading: 20, bottom: 0, trailing: 20 }]);
    expect(readable).toEqual([{ top: 0, leading: 164, bottom: 0, trailing: 164 }]);
  });

  test('coalesces triggers inside the settle window into one flush', () => {
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds }));
    const { margins, readable } = startSession(provider);
    expect(provider.snapshotCount).toBe(1);

    provider.current = makeSnapshot({
      bounds,
      readableRegion: { minX: 100, minY: 0, maxX: 900, maxY: 400 },
      layoutMargins: { leading: 16, trailing: 16 }
    });
    provider.emit('marginsChange');
    provider.emit('layout');
    provider.emit('frameChange');
    expect(margins).toHaveLength(1);
    expect(readable).toHaveLength(1);

    jest.advanceTimersByTime(10);
    expect(provider.snapshotCount).toBe(2);
    expect(margins).toEqual([createEdgeInsets(), { top: 0, leading: 16, bottom: 0, trailing: 16 }]);
    expect(readable).toEqual([createEdgeInsets(), { top: 0, leading: 100, bottom: 0, trailing: 100 }]);
  });

  test('a margins trigger only re-evaluates the margins guide', () => {
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds }));
    const { margins, readable } = startSession(provider);
    jest.advanceTimersByTime(10);

    provider.current = makeSnapshot({
      bounds,
      readableRegion: { minX: 50, minY: 0, maxX: 950, maxY: 400 },
      layoutMargins: { leading: 8 }
    });
    provider.emit('marginsChange');

    expect(margins).toHaveLength(2);
    expect(margins[1]).toEqual({ top: 0, leading: 8, bottom: 0, trailing: 0 });
    expect(readable).toHaveLength(1);
  });

  test.each(['layout', 'frameChange', 'directionChange'] as const)(
    'a %s trigger only re-evaluates the readable content guide',
    (trigger) => {
      const provider = makeFakeGuideProvider(makeSnapshot({ bounds }));
      const { margins, readable } = startSession(provider);
      jest.advanceTimersByTime(10);

      provider.current = makeSnapshot({
        bounds,
        readableRegion: { minX: 50, minY: 0, maxX: 950, maxY: 400 },
        layoutMargins: { leading: 8, trailing: 8 }
      });
      provider.emit(trigger);
      jest.advanceTimersByTime(10);

      expect(margins).toHaveLength(1);
      expect(readable).toHaveLength(2);
      expect(readable[1]).toEqual({ top: 0, leading: 50, bottom: 0, trailing: 50 });
    }
  );

  test('unchanged geometry publishes nothing', () => {
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds }));
    const { margins, readable } = startSession(provider);
    jest.advanceTimersByTime(10);

    provider.emit('layout');
    provider.emit('directionChange');
    jest.advanceTimersByTime(10);

    expect(margins).toHaveLength(1);
    expect(readable).toHaveLength(1);
  });

  test('a direction change swaps the published leading and trailing', () => {
    const readableRegion = { minX: 100, minY: 0, maxX: 700, maxY: 400 };
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds, readableRegion }));
    const { readable } = startSession(provider);
    jest.advanceTimersByTime(10);

    provider.current = makeSnapshot({ bounds, readableRegion, direction: 'rtl' });
    provider.emit('directionChange');

    expect(readable).toEqual([
      { top: 0, leading: 100, bottom: 0, trailing: 300 },
      { top: 0, leading: 300, bottom: 0, trailing: 100 }
    ]);
  });

  test('top/bottom-only oscillation of the readable region is not published', () => {
    const region = (minY: number) => ({ minX: 100, minY, maxX: 900, maxY: 400 });
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds, readableRegion: region(0) }));
    const { readable } = startSession(provider);

    for (const minY of [12, 0, 12, 0]) {
      jest.advanceTimersByTime(20);
      provider.current = makeSnapshot({ bounds, readableRegion: region(minY) });
      provider.emit('layout');
    }
    jest.advanceTimersByTime(20);

    expect(readable).toEqual([{ top: 0, leading: 100, bottom: 0, trailing: 100 }]);
  });

  test('dispose cancels the pending flush and disconnects', () => {
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds }));
    const { session, margins } = startSession(provider);

    provider.current = makeSnapshot({ bounds, layoutMargins: { leading: 30 } });
    provider.emit('marginsChange');
    session.dispose();
    jest.advanceTimersByTime(50);

    expect(provider.disconnectCount).toBe(1);
    expect(margins).toHaveLength(1);

    session.trigger('marginsChange');
    session.dispose();
    expect(margins).toHaveLength(1);
    expect(provider.disconnectCount).toBe(1);
  });

  test('a failing snapshot keeps the last published insets', () => {
    const provider = makeFakeGuideProvider(makeSnapshot({ bounds, layoutMargins: { leading: 20 } }));
    const element = document.createElement('div');
    const margins: EdgeInsets[] = [];
    let failing = false;
    const session = new LayoutGuidesSession({
      observe: (onTrigger) => {
        const observation = provider.observe(element, onTrigger);
        return {
          snapshot: () => {
            if (failing) throw new Error('detached');
            return observation.snapshot();
          },
          disconnect: observation.disconnect
        };
      },
      onLayoutMarginsChange: (insets) => margins.push(insets),
      onReadableContentChange: () => undefined,
      settleIntervalMs: 10,
      updateBaselineOnSuppressed: true
    });
    session.start();
    jest.advanceTimersByTime(10);

    failing = true;
    expect(() => provider.emit('marginsChange')).not.toThrow();
    expect(margins).toEqual([{ top: 0, leading: 20, bottom: 0, trailing: 0 }]);

    failing = false;
    jest.advanceTimersByTime(10);
    provider.current = makeSnapshot({ bounds, layoutMargins: { leading: 24 } });
    provider.emit('marginsChange');
    expect(margins).toHaveLength(2);
    session.dispose();
  });
});
