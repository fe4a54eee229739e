export type EdgeInsets = {
  readonly top: number;
  readonly leading: number;
  readonly bottom: number;
  readonly trailing: number;
};

export type Edge = keyof EdgeInsets;

export const ZERO_INSETS: EdgeInsets = Object.freeze({ top: 0, leading: 0, bottom: 0, trailing: 0 });

export function createEdgeInsets(partial: Partial<EdgeInsets> = {}): EdgeInsets {
  return Object.freeze({
    top: partial.top ?? 0,
    leading: partial.leading ?? 0,
    bottom: partial.bottom ?? 0,
    trailing: partial.trailing ?? 0
  });
}

export function edgeInsetsEqual(a: EdgeInsets | null, b: EdgeInsets | null): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return a.top === b.top && a.leading === b.leading && a.bottom === b.bottom && a.trailing === b.trailing;
}

export function horizontalInsets(insets: EdgeInsets): number {
  return insets.leading + insets.trailing;
}
