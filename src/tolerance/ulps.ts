// Doubles reinterpreted as 64-bit integers are ordered like the doubles
// themselves once the sign-magnitude encoding is folded into two's complement.
// +0 and -0 both map to 0.

const SIGN_BIT = 1n << 63n;
const MAGNITUDE_MASK = SIGN_BIT - 1n;

const view = new DataView(new ArrayBuffer(8));

function toOrderedBits(value: number): bigint {
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const magnitude = bits & MAGNITUDE_MASK;
  return (bits & SIGN_BIT) === 0n ? magnitude : -magnitude;
}

function fromOrderedBits(ordered: bigint): number {
  view.setBigUint64(0, ordered >= 0n ? ordered : -ordered | SIGN_BIT);
  return view.getFloat64(0);
}

/**
 * Move `value` by `steps` representable doubles (negative steps move down).
 * NaN and infinities are returned unchanged.
 */
export function stepUlps(value: number, steps: number): number {
  if (!Number.isFinite(value)) return value;
  return fromOrderedBits(toOrderedBits(value) + BigInt(steps));
}
