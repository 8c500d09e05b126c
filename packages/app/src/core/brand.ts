// CHANGE: introduce branded primitives for PESEL values
// WHY: a bare string must never pass for a validated 11-digit number
// QUOTE(TZ): "the type cannot hold an internally inconsistent state"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall x in Domain: brand(x) -> preserves(value(x))
// PURITY: CORE
// INVARIANT: PeselNumber is only branded inside the codec after every check passed
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

export type PeselNumber = Brand<string, "PeselNumber">
export type RngSeed = Brand<number, "RngSeed">
export type BirthDateString = Brand<string, "BirthDateString">

// CHANGE: brand a checked digit string
// WHY: only the codec calls this, after length, date and checksum checks
// QUOTE(TZ): "digits is always exactly the canonical encoding"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall s in String: PeselNumber(s) = s
// PURITY: CORE
// INVARIANT: branding does not change runtime representation
// COMPLEXITY: O(1)/O(1)
export const PeselNumber = (value: string): PeselNumber => value as PeselNumber

// CHANGE: provide constructors for RNG seeds
// WHY: make filler randomness explicit and deterministic in the core
// QUOTE(TZ): "an implementation may use zeros or a pseudo-random source"
// REF: user-2026-10-19-pesel
// SOURCE: n/a
// FORMAT THEOREM: forall n in Number: RngSeed(n) = n
// PURITY: CORE
// INVARIANT: seed remains a number
// COMPLEXITY: O(1)/O(1)
export const RngSeed = (value: number): RngSeed => value as RngSeed

export const BirthDateString = (value: string): BirthDateString => value as BirthDateString
