export {
  AccessOperation,
  ConfiguredAccessGate,
  isWriteOperation,
  type AccessDecision,
  type AccessGate,
} from './access-gate.js';
