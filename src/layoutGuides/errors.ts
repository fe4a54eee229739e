export type LayoutGuidesConfigField =
  | 'settleIntervalMs'
  | 'fallbackMaxWidth'
  | 'readableContentMaxWidth'
  | 'defaultLayoutMargin';

export class LayoutGuidesConfigError extends Error {
  field: LayoutGuidesConfigField;
  value: unknown;

  constructor(args: { field: LayoutGuidesConfigField; value: unknown; message: string }) {
    super(args.message);
    this.name = 'LayoutGuidesConfigError';
    this.field = args.field;
    this.value = args.value;
  }
}
