/**
 * forward-dual - Forward-mode automatic differentiation with dual numbers
 *
 * A dual number carries a value together with its derivative with respect
 * to one input. Compose the operations below, then hand the function to
 * deriv() to get its exact derivative as an ordinary number function.
 */

// Core API
export {
  Dual,
  dual,
  lift,
  constant,
  variable,
  toDual,
  add,
  sub,
  mul,
  negate,
  type Operand
} from './forward/Dual.js';
export {
  elementary,
  elementaries,
  ElementaryRegistry,
  sin,
  cos,
  exp,
  log,
  sqrt,
  tan,
  type RealFunction,
  type DualFunction
} from './forward/Elementary.js';
export {
  deriv,
  evaluate,
  valueAndDeriv,
  type DifferentiableFunction,
  type ValueAndDeriv
} from './forward/Derive.js';

// Derivative verification utilities
export {
  DerivativeChecker,
  formatDerivativeCheckResult,
  type DerivativeCheckResult,
  type DerivativeCheckError
} from './forward/DerivativeChecker.js';

// Errors
export {
  UsageError,
  InvalidOptionError,
  UnknownExampleError,
  UnknownFunctionError
} from './forward/Errors.js';
