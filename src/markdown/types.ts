// pattern: Functional Core

export type ConversionOptions = {
  readonly maxLength?: number;
  readonly startIndex?: number;
};

export type ConversionResult = {
  readonly markdown: string;
  readonly truncated: boolean;
  readonly totalLength: number;
  readonly startIndex: number;
  readonly nextStartIndex?: number;
};

export type TruncationResult = {
  readonly text: string;
  readonly truncated: boolean;
  readonly nextStartIndex?: number;
};
