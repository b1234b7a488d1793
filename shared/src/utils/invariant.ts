/**
 * Consistency checks for simulation values.
 *
 * A value outside its legal range means a logic defect. In strict mode
 * (development, tests) the check throws; otherwise the value is clamped
 * and the violation is reported to the optional handler.
 */

export class InvariantViolation extends Error {
  constructor(
    message: string,
    readonly label: string,
    readonly value: number,
  ) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export type ViolationHandler = (violation: InvariantViolation) => void;

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

export function checkRange(
  value: number,
  min: number,
  max: number,
  label: string,
  strict: boolean,
  onViolation?: ViolationHandler,
): number {
  if (value >= min && value <= max) return value;

  const violation = new InvariantViolation(
    `${label} out of range: ${value} not in [${min}, ${max}]`,
    label,
    value,
  );
  if (strict) throw violation;

  onViolation?.(violation);
  return Number.isNaN(value) ? min : clamp(value, min, max);
}
