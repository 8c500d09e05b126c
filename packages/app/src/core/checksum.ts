export const checksumWeights: ReadonlyArray<number> = [1, 3, 7, 9, 1, 3, 7, 9, 1, 3]

// CHANGE: compute the PESEL check digit
// WHY: the 11th digit guards the first ten against single-digit typos
// QUOTE(TZ): "the check digit is (10 - (sum mod 10)) mod 10"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall d in Digit^10: checksum(d) = (10 - Σ w_i * d_i mod 10) mod 10
// PURITY: CORE
// INVARIANT: result is within 0..9; digits beyond the tenth are ignored
// COMPLEXITY: O(1)/O(1)
export const computeChecksum = (digits: ReadonlyArray<number>): number => {
  let sum = 0
  for (const [index, weight] of checksumWeights.entries()) {
    sum += weight * (digits[index] ?? 0)
  }
  return (10 - (sum % 10)) % 10
}
