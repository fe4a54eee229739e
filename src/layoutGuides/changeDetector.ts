import { edgeInsetsEqual, type EdgeInsets } from './edgeInsets';
import type { GuideKind } from './geometry';

/**
 * - `publish`: the sample should become the ambient value.
 * - `duplicate`: structurally equal to the previous sample.
 * - `edgeStable`: readable content only; leading and trailing did not move, only top/bottom drifted.
 */
export type ChangeDecision = 'publish' | 'duplicate' | 'edgeStable';

export function detectChange(guide: GuideKind, previous: EdgeInsets | null, next: EdgeInsets): ChangeDecision {
  if (previous === null) return 'publish';
  if (edgeInsetsEqual(previous, next)) return 'duplicate';
  if (guide === 'layoutMargins') return 'publish';

  // During rotation the trailing inset can flip between values; once leading and trailing
  // settle, the remaining top/bottom-only churn is not republished.
  if (previous.leading === next.leading && previous.trailing === next.trailing) return 'edgeStable';
  return 'publish';
}

export type ChangeDetectorOptions = {
  /** Whether an `edgeStable` sample replaces the comparison baseline. */
  updateBaselineOnSuppressed: boolean;
};

export class ChangeDetector {
  readonly guide: GuideKind;
  private readonly options: ChangeDetectorOptions;
  private previous: EdgeInsets | null = null;

  constructor(guide: GuideKind, options: ChangeDetectorOptions = { updateBaselineOnSuppressed: true }) {
    this.guide = guide;
    this.options = options;
  }

  get baseline(): EdgeInsets | null {
    return this.previous;
  }

  evaluate(next: EdgeInsets): ChangeDecision {
    const decision = detectChange(this.guide, this.previous, next);
    if (decision === 'publish' || (decision === 'edgeStable' && this.options.updateBaselineOnSuppressed)) {
      this.previous = next;
    }
    return decision;
  }

  reset(): void {
    this.previous = null;
  }
}
