/**
 * IR Validation exports
 */

export {
  type IrVerificationResult,
  BUILTIN_FUNCTIONS,
  verifyModule,
  verifyModules,
} from "./ir-verifier.js";
