export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

export function isValidDimensions(value: Dimensions): boolean {
  return (
    Number.isInteger(value.width) &&
    Number.isInteger(value.height) &&
    value.width > 0 &&
    value.height > 0
  );
}

export function sameDimensions(a: Dimensions, b: Dimensions): boolean {
  return a.width === b.width && a.height === b.height;
}
