export {
  PARSER_VERSION,
  PARSER_NAME,
  VALUATION_CURRENCY,
  ERA_OFFSETS,
  ERA_PREFIXES,
  CONFIDENCE_THRESHOLDS,
} from './constants.js';
export {
  isLeapYear,
  daysInMonth,
  isValidCalendarDate,
  eraYearToGregorian,
  currentReiwaYear,
  toIsoDate,
  toWarekiDisplay,
  parseIsoDate,
  isValidISODate,
  compareDates,
  type CalendarDate,
} from './date.js';
export { parseAmount } from './money.js';
