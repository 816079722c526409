/**
 * @passbook/date-inference
 *
 * Two-digit passbook year resolution: the cascading inference engine,
 * per-session learned bank formats and the resolver strategies used by the
 * row pipeline.
 */

export { DateInferenceEngine, formatTwoDigitDate } from './engine.js';
export type { DateInferenceEngineOptions, TwoDigitDate } from './engine.js';

export { LearnedFormatTable } from './learned-formats.js';
export type { LearnedBankFormat, LearnDetails } from './learned-formats.js';

export { KNOWN_BANKS, lookupBankFormat, findBankCodeByName } from './bank-formats.js';
export type { KnownBank, BankDateFormat } from './bank-formats.js';

export {
  SimpleYearResolver,
  ContextualYearResolver,
  createYearResolver,
  resolveTwoDigitYear,
} from './year-resolver.js';
export type {
  YearResolver,
  YearToken,
  YearResolution,
  YearResolverScope,
  ContextualYearResolverOptions,
  CreateYearResolverOptions,
} from './year-resolver.js';
