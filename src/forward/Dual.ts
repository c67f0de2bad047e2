/**
 * Dual numbers for forward-mode automatic differentiation.
 *
 * A dual pairs a primal value with its tangent: the derivative of that
 * value with respect to the one input variable the computation was seeded
 * with. Every operation returns a new dual; nothing is mutated.
 */

/**
 * Anything that can stand where a dual is expected.
 * Plain numbers are lifted to constants.
 */
export type Operand = Dual | number;

export class Dual {
  constructor(
    public readonly value: number,
    public readonly deriv: number
  ) {
    Object.freeze(this);
  }

  add(other: Operand): Dual {
    return add(this, other);
  }

  sub(other: Operand): Dual {
    return sub(this, other);
  }

  mul(other: Operand): Dual {
    return mul(this, other);
  }

  neg(): Dual {
    return negate(this);
  }

  /**
   * Component-wise identity, using Object.is so NaN equals NaN
   * and -0 differs from 0
   */
  equals(other: Dual): boolean {
    return Object.is(this.value, other.value) && Object.is(this.deriv, other.deriv);
  }

  toString(): string {
    return `Dual(${this.value}, ${this.deriv})`;
  }
}

export function dual(value: number, deriv: number): Dual {
  return new Dual(value, deriv);
}

/**
 * Lift a real number to a constant: zero derivative
 */
export function lift(c: number): Dual {
  return new Dual(c, 0);
}

export const constant = lift;

/**
 * Seed the free variable: dx/dx = 1
 */
export function variable(x: number): Dual {
  return new Dual(x, 1);
}

export function toDual(operand: Operand): Dual {
  return typeof operand === 'number' ? lift(operand) : operand;
}

// Number operands go through lift, so a + c is exactly a + (c, 0).

export function add(left: Operand, right: Operand): Dual {
  const a = toDual(left);
  const b = toDual(right);
  return new Dual(a.value + b.value, a.deriv + b.deriv);
}

export function sub(left: Operand, right: Operand): Dual {
  const a = toDual(left);
  const b = toDual(right);
  return new Dual(a.value - b.value, a.deriv - b.deriv);
}

/**
 * Product rule: (ab)' = a'b + ab'
 */
export function mul(left: Operand, right: Operand): Dual {
  const a = toDual(left);
  const b = toDual(right);
  return new Dual(a.value * b.value, a.deriv * b.value + a.value * b.deriv);
}

export function negate(operand: Operand): Dual {
  const a = toDual(operand);
  return new Dual(-a.value, -a.deriv);
}
