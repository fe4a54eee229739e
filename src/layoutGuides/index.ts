export { ZERO_INSETS, createEdgeInsets, edgeInsetsEqual, horizontalInsets } from './edgeInsets';
export type { Edge, EdgeInsets } from './edgeInsets';
export { boundsFromRect } from './geometry';
export type { Bounds, GeometrySnapshot, GuideKind, TextDirection } from './geometry';
export { sampleLayoutMargins, sampleReadableContentInsets } from './geometrySampler';
export { ChangeDetector, detectChange } from './changeDetector';
export type { ChangeDecision, ChangeDetectorOptions } from './changeDetector';
export { SettleDebouncer } from './settleDebouncer';
export type { Dispatch, SettleDebouncerOptions } from './settleDebouncer';
export { noopGuideProvider } from './guideProvider';
export type { GeometryTrigger, GuideObservation, GuideProvider } from './guideProvider';
export { createDomGuideProvider, defaultGuideProvider, isDomGuideSupported } from './domGuideProvider';
export type { DomGuideProviderOptions } from './domGuideProvider';
export { LayoutGuidesSession, guideForTrigger } from './measurementSession';
export type { LayoutGuidesSessionOptions } from './measurementSession';
export {
  DEFAULT_FALLBACK_MAX_WIDTH,
  DEFAULT_LAYOUT_MARGIN,
  DEFAULT_READABLE_CONTENT_MAX_WIDTH,
  DEFAULT_SETTLE_INTERVAL_MS,
  resolveLayoutGuidesConfig
} from './config';
export type { LayoutGuidesConfig } from './config';
export { LayoutGuidesConfigError } from './errors';
export type { LayoutGuidesConfigField } from './errors';
export { LayoutGuidesConfigProvider, useLayoutGuidesConfig } from './LayoutGuidesConfigContext';
export {
  DEFAULT_LAYOUT_GUIDES,
  useLayoutGuides,
  useLayoutMarginsInsets,
  useReadableContentInsets
} from './LayoutGuidesContext';
export type { LayoutGuidesValue } from './LayoutGuidesContext';
export { useLayoutGuidesMeasurement } from './useLayoutGuidesMeasurement';
export { HORIZONTAL_EDGES, layoutMarginsWidthStyle, readableContentWidthStyle } from './constraintStyles';
export type { Alignment, EdgeSet, HorizontalEdge } from './constraintStyles';
export { MeasureLayoutMargins } from './components/MeasureLayoutMargins';
export { WithLayoutMargins } from './components/WithLayoutMargins';
export { FitReadableContentWidth } from './components/FitReadableContentWidth';
export { FitLayoutMarginsWidth } from './components/FitLayoutMarginsWidth';
