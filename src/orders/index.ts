export {
  TRANSITIONS,
  canTransition,
  createOrderRecord,
  isTerminal,
  nextStateForReport,
  transition,
  type OrderRecord,
  type OrderTransition,
  type ReportExitOptions,
  type TransitionOptions,
} from "./machine.js";
