/**
 * @meridian/pairing
 *
 * Owner-issued pairing codes that register and bind an agent in one step.
 */

export {
  ALPHABET,
  type CodeGenerator,
  formatPairingCode,
  type GeneratedCode,
  generatePairingCode,
  isWellFormedCode,
  normalizePairingCode,
} from "./code-generator.js";
export { type PairingResult, PairingService, type PairingServiceDeps } from "./pairing-service.js";
export {
  DEFAULT_PAIRING_CONFIG,
  type IssuedCode,
  type PairingConfig,
  validatePairingConfig,
} from "./types.js";
