// Shared positional types

export interface Position {
  readonly line: number;
  readonly col: number;
}
