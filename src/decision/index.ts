export * from './types.js';
export { resolveCountry, COUNTRIES, FALLBACK_COUNTRY } from './country.js';
export { assertApproved, DecisionError, ConfigError, FAILURE_MESSAGES } from './errors.js';
export { checkDigit, isValidPersonalCode, parsePersonalCode } from './personalCode.js';
export { segmentOf, creditModifier } from './segments.js';
export { ageBetween, checkAge } from './age.js';
export { validateRequest } from './validate.js';
export { capacity, optimizeLoan } from './optimizer.js';
export { createDecisionEngine, decide } from './engine.js';
export type { DecisionEngine, DecisionEngineDeps } from './engine.js';
export {
  DEFAULT_CONFIG,
  parseDecisionConfig,
  loadDecisionConfig,
  getDecisionConfig,
  resetConfigCache,
} from '../config/index.js';
export { createLogger, defaultLogger } from '../log.js';
