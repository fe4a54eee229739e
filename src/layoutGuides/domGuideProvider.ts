import { createEdgeInsets } from './edgeInsets';
import { boundsFromRect, type TextDirection } from './geometry';
import { noopGuideProvider, type GeometryTrigger, type GuideObservation, type GuideProvider } from './guideProvider';

export type DomGuideProviderOptions = {
  /** Maximum width (CSS px) of the readable region inside the host's content box. */
  readableContentMaxWidth: number;
};

export const READABLE_GUIDE_ATTRIBUTE = 'data-readable-content-guide';

function readPx(raw: string | null | undefined): number {
  if (!raw) return 0;
  const n = parseFloat(raw);
  return Number.isFinite(n) ? n : 0;
}

function readDirection(style: CSSStyleDeclaration): TextDirection {
  return style.direction === 'rtl' ? 'rtl' : 'ltr';
}

function computedStyleOf(element: HTMLElement): CSSStyleDeclaration {
  const view = element.ownerDocument.defaultView ?? window;
  return view.getComputedStyle(element);
}

export function isDomGuideSupported(): boolean {
  return (
    typeof window !== 'undefined' &&
    typeof window.ResizeObserver !== 'undefined' &&
    typeof window.MutationObserver !== 'undefined'
  );
}

/**
 * Measures a host element the way a native view exposes its guides:
 * - layout margins are the host's computed padding,
 * - the readable region is a child box capped at `readableContentMaxWidth`
 *   and centered in the host's content box.
 */
export function createDomGuideProvider({ readableContentMaxWidth }: DomGuideProviderOptions): GuideProvider {
  return {
    hasNativeGuides: true,
    observe(element: HTMLElement, onTrigger: (trigger: GeometryTrigger) => void): GuideObservation {
      const doc = element.ownerDocument;

      const readableGuide = doc.createElement('div');
      readableGuide.setAttribute(READABLE_GUIDE_ATTRIBUTE, '');
      readableGuide.style.boxSizing = 'border-box';
      readableGuide.style.height = '100%';
      readableGuide.style.width = '100%';
      readableGuide.style.maxWidth = `${readableContentMaxWidth}px`;
      readableGuide.style.marginInlineStart = 'auto';
      readableGuide.style.marginInlineEnd = 'auto';
      element.appendChild(readableGuide);

      const frameObserver = new ResizeObserver(() => onTrigger('frameChange'));
      frameObserver.observe(element, { box: 'border-box' });

      // The host box is pinned to its container, so a padding change shows up as a content-box resize.
      const marginsObserver = new ResizeObserver(() => onTrigger('marginsChange'));
      marginsObserver.observe(element, { box: 'content-box' });

      const layoutObserver = new ResizeObserver(() => onTrigger('layout'));
      layoutObserver.observe(readableGuide);

      let direction = readDirection(computedStyleOf(element));
      const directionObserver = new MutationObserver(() => {
        const next = readDirection(computedStyleOf(element));
        if (next === direction) return;
        direction = next;
        onTrigger('directionChange');
      });
      directionObserver.observe(doc.documentElement, { attributes: true, attributeFilter: ['dir'], subtree: true });

      return {
        snapshot: () => {
          const style = computedStyleOf(element);
          const dir = readDirection(style);
          const left = readPx(style.paddingLeft);
          const right = readPx(style.paddingRight);
          return {
            bounds: boundsFromRect(element.getBoundingClientRect()),
            readableRegion: boundsFromRect(readableGuide.getBoundingClientRect()),
            layoutMargins: createEdgeInsets({
              top: readPx(style.paddingTop),
              leading: dir === 'rtl' ? right : left,
              bottom: readPx(style.paddingBottom),
              trailing: dir === 'rtl' ? left : right
            }),
            direction: dir
          };
        },
        disconnect: () => {
          frameObserver.disconnect();
          marginsObserver.disconnect();
          layoutObserver.disconnect();
          directionObserver.disconnect();
          readableGuide.remove();
        }
      };
    }
  };
}

export function defaultGuideProvider(options: DomGuideProviderOptions): GuideProvider {
  return isDomGuideSupported() ? createDomGuideProvider(options) : noopGuideProvider;
}
