export function clamp(x: number, min: number, max: number): number {
  return x < min ? min : x > max ? max : x;
}

export function lerp(a: number, b: number, t: number): number {
  return a + t * (b - a);
}

/** x mod 1, kept in [0, 1) for negative x as well. */
export function frac(x: number): number {
  const f = x % 1;
  return f < 0 ? f + 1 : f;
}
