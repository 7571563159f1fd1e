export {
  addDisclaimer,
  addTrust,
  disclaimerTag,
  injectLsi,
  joinList,
  moveLink,
  type Fix,
  type FixAttempt,
} from "./fixes.js";

export { MAX_AUTOFIX_ATTEMPTS, fixTypeFor, maybeFix, type FixOutcome } from "./controller.js";
