export {
  CircuitBreaker,
  type CircuitBreakerOptions,
  type CircuitPhase,
  type CircuitSnapshot,
  type GuardOptions,
  type GuardVerdict,
  type GuardResult
} from './circuit-breaker.js';
export { RequestGate, type Permit, type GateStats } from './request-gate.js';
export {
  DEFAULT_SUSPICION_THRESHOLD,
  screenInput,
  type InputScreening,
  type ScreeningCode
} from './injection-guard.js';
