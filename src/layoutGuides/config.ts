import { defaultGuideProvider } from './domGuideProvider';
import { LayoutGuidesConfigError, type LayoutGuidesConfigField } from './errors';
import type { GuideProvider } from './guideProvider';

export type LayoutGuidesConfig = {
  /** Debounce window for geometry changes. */
  settleIntervalMs: number;
  /** Max content width used by `FitReadableContentWidth` when there are no native guides. */
  fallbackMaxWidth: number;
  readableContentMaxWidth: number;
  /** Horizontal padding of the guide element, i.e. the layout margins before safe-area insets. */
  defaultLayoutMargin: number;
  updateBaselineOnSuppressed: boolean;
  guideProvider: GuideProvider;
};

export const DEFAULT_SETTLE_INTERVAL_MS = 10;
export const DEFAULT_FALLBACK_MAX_WIDTH = 850;
export const DEFAULT_READABLE_CONTENT_MAX_WIDTH = 672;
export const DEFAULT_LAYOUT_MARGIN = 16;

function requireNumber(field: LayoutGuidesConfigField, value: number, { allowZero }: { allowZero: boolean }): number {
  const valid = Number.isFinite(value) && (allowZero ? value >= 0 : value > 0);
  if (!valid) {
    throw new LayoutGuidesConfigError({
      field,
      value,
      message: `${field} must be a finite number ${allowZero ? '>= 0' : '> 0'} (got ${String(value)})`
    });
  }
  return value;
}

export function resolveLayoutGuidesConfig(partial: Partial<LayoutGuidesConfig> = {}): LayoutGuidesConfig {
  const readableContentMaxWidth = requireNumber(
    'readableContentMaxWidth',
    partial.readableContentMaxWidth ?? DEFAULT_READABLE_CONTENT_MAX_WIDTH,
    { allowZero: false }
  );
  return {
    settleIntervalMs: requireNumber('settleIntervalMs', partial.settleIntervalMs ?? DEFAULT_SETTLE_INTERVAL_MS, {
      allowZero: true
    }),
    fallbackMaxWidth: requireNumber('fallbackMaxWidth', partial.fallbackMaxWidth ?? DEFAULT_FALLBACK_MAX_WIDTH, {
      allowZero: false
    }),
    readableContentMaxWidth,
    defaultLayoutMargin: requireNumber('defaultLayoutMargin', partial.defaultLayoutMargin ?? DEFAULT_LAYOUT_MARGIN, {
      allowZero: true
    }),
    updateBaselineOnSuppressed: partial.updateBaselineOnSuppressed ?? true,
    guideProvider: partial.guideProvider ?? defaultGuideProvider({ readableContentMaxWidth })
  };
}
