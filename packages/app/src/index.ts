export type { BirthDateString, PeselNumber } from "./core/brand.js"
export { RngSeed } from "./core/brand.js"
export { type DateParts, daysInMonth, formatBirthDate, isLeapYear, isValidDate } from "./core/calendar.js"
export { centuryBuckets, centuryOffset, decodeMonth, maxYear, minYear, resolveCentury } from "./core/century.js"
export { checksumWeights, computeChecksum } from "./core/checksum.js"
export {
  ChecksumMismatch,
  InvalidDate,
  InvalidLength,
  InvalidMonth,
  NonDigitCharacter,
  type PeselGenerationError,
  type PeselParseError,
  YearOutOfRange
} from "./core/errors.js"
export {
  birthDate,
  type BirthRequest,
  type Filler,
  formatPesel,
  type GeneratedPesel,
  generatePesel,
  isFemale,
  isMale,
  parsePesel,
  type Pesel,
  peselLength,
  seededFiller,
  type Sex,
  zerosFiller
} from "./core/pesel.js"
export { describePesel, formatGenerationError, formatParseError } from "./core/text.js"
