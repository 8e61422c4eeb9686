/** Binary to reflected Gray code. */
export function binToGray(value: number): number {
  return (value ^ (value >>> 1)) >>> 0;
}

/** Reflected Gray code to binary. */
export function grayToBin(gray: number): number {
  let value = gray >>> 0;
  for (let shift = gray >>> 1; shift !== 0; shift >>>= 1) {
    value ^= shift;
  }
  return value >>> 0;
}
