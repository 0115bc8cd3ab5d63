export {
  startSession,
  yearlyHeading,
  yearlyLines,
  parseYear,
  monthlyOutcome,
  loadRefundsIntoSession,
  NO_ORDERS_MESSAGE,
} from './session.js'
export type { Session, SessionStart, MonthlyOutcome, RefundLoadOutcome } from './session.js'
export { runMenu, runInteractiveSession } from './menu.js'
