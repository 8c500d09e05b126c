import { RngSeed } from "./brand.js"

const modulus = 2_147_483_647
const multiplier = 48_271

// CHANGE: advance the deterministic RNG seed
// WHY: keep filler digits pure and reproducible for tests
// QUOTE(TZ): "must not depend on or mutate any external state visible to the caller"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall s: 0 < next(s) < modulus
// PURITY: CORE
// INVARIANT: seed is always within (0, modulus)
// COMPLEXITY: O(1)/O(1)
export const nextSeed = (seed: RngSeed): RngSeed => {
  const normalized = seed % modulus
  const positive = normalized > 0 ? normalized : normalized + modulus - 1
  return RngSeed((positive * multiplier) % modulus)
}

// CHANGE: sample a random integer below an upper bound
// WHY: draw single filler digits and the parity-free half of the sex digit
// QUOTE(TZ): "any value is acceptable for the other three digits of this block"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall n>0: value in [0, n)
// PURITY: CORE
// INVARIANT: returned seed is advanced exactly once
// COMPLEXITY: O(1)/O(1)
export const randomInt = (
  seed: RngSeed,
  upperExclusive: number
): { readonly value: number; readonly seed: RngSeed } => {
  const next = nextSeed(seed)
  const value = upperExclusive <= 0 ? 0 : next % upperExclusive
  return { value, seed: next }
}

export const randomDigits = (
  seed: RngSeed,
  count: number
): { readonly digits: ReadonlyArray<number>; readonly seed: RngSeed } => {
  const digits: Array<number> = []
  let next = seed
  for (let i = 0; i < count; i += 1) {
    const result = randomInt(next, 10)
    digits.push(result.value)
    next = result.seed
  }
  return { digits, seed: next }
}
