import { InvalidParameterError } from '../models/errors';

export function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(name, `${name} must be a finite number, got ${value}`, { value });
  }
}

export function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidParameterError(name, `${name} must be an integer >= 1, got ${value}`, { value });
  }
}

export function requireNonNegative(name: string, value: number): void {
  requireFinite(name, value);
  if (value < 0) {
    throw new InvalidParameterError(name, `${name} must be >= 0, got ${value}`, { value });
  }
}

export function requirePositive(name: string, value: number): void {
  requireFinite(name, value);
  if (value <= 0) {
    throw new InvalidParameterError(name, `${name} must be > 0, got ${value}`, { value });
  }
}
