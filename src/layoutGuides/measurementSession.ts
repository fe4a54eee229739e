import { ChangeDetector } from './changeDetector';
import { layoutGuidesLog } from './debugLog';
import type { EdgeInsets } from './edgeInsets';
import type { GeometrySnapshot, GuideKind } from './geometry';
import { sampleLayoutMargins, sampleReadableContentInsets } from './geometrySampler';
import type { GeometryTrigger, GuideObservation } from './guideProvider';
import { SettleDebouncer, type Dispatch } from './settleDebouncer';

export type LayoutGuidesSessionOptions = {
  /** Subscribes to the host's geometry; called once by `start()`. */
  observe: (onTrigger: (trigger: GeometryTrigger) => void) => GuideObservation;
  onLayoutMarginsChange: (insets: EdgeInsets) => void;
  onReadableContentChange: (insets: EdgeInsets) => void;
  settleIntervalMs: number;
  updateBaselineOnSuppressed: boolean;
  dispatch?: Dispatch;
};

export function guideForTrigger(trigger: GeometryTrigger): GuideKind {
  return trigger === 'marginsChange' ? 'layoutMargins' : 'readableContent';
}

/**
 * Measures one host element for its whole lifetime.
 *
 * Triggers only mark guides dirty; the debounced flush samples once and evaluates
 * every dirty guide, so a margins change coalesced with a later layout pass still lands.
 */
export class LayoutGuidesSession {
  private readonly options: LayoutGuidesSessionOptions;
  private readonly debouncer: SettleDebouncer;
  private readonly detectors: Record<GuideKind, ChangeDetector>;
  private readonly dirty = new Set<GuideKind>();
  private observation: GuideObservation | null = null;
  private disposed = false;

  constructor(options: LayoutGuidesSessionOptions) {
    this.options = options;
    this.debouncer = new SettleDebouncer({ settleIntervalMs: options.settleIntervalMs, dispatch: options.dispatch });
    const detectorOptions = { updateBaselineOnSuppressed: options.updateBaselineOnSuppressed };
    this.detectors = {
      layoutMargins: new ChangeDetector('layoutMargins', detectorOptions),
      readableContent: new ChangeDetector('readableContent', detectorOptions)
    };
  }

  start(): void {
    if (this.disposed || this.observation) return;
    this.observation = this.options.observe((trigger) => this.trigger(trigger));
    this.dirty.add('layoutMargins');
    this.dirty.add('readableContent');
    this.debouncer.run(() => this.flush());
  }

  trigger(trigger: GeometryTrigger): void {
    if (this.disposed) return;
    this.dirty.add(guideForTrigger(trigger));
    this.debouncer.run(() => this.flush());
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.debouncer.cancel();
    this.dirty.clear();
    this.observation?.disconnect();
    this.observation = null;
  }

  private flush(): void {
    if (this.disposed || !this.observation || this.dirty.size === 0) return;
    const guides = new Set(this.dirty);
    this.dirty.clear();

    let snapshot: GeometrySnapshot | null;
    try {
      snapshot = this.observation.snapshot();
    } catch (e: unknown) {
      layoutGuidesLog('measurement failed; keeping last insets', e instanceof Error ? e.message : String(e));
      return;
    }
    if (!snapshot) return;

    if (guides.has('layoutMargins')) {
      this.publishIfChanged('layoutMargins', sampleLayoutMargins(snapshot), this.options.onLayoutMarginsChange);
    }
    if (guides.has('readableContent')) {
      this.publishIfChanged(
        'readableContent',
        sampleReadableContentInsets(snapshot),
        this.options.onReadableContentChange
      );
    }
  }

  private publishIfChanged(guide: GuideKind, insets: EdgeInsets, publish: (insets: EdgeInsets) => void): void {
    const decision = this.detectors[guide].evaluate(insets);
    if (decision !== 'publish') {
      layoutGuidesLog(`${guide} ${decision}`, insets);
      return;
    }
    layoutGuidesLog(`${guide} published`, insets);
    publish(insets);
  }
}
