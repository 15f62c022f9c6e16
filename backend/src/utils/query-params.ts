import { Request } from 'express';

export class InvalidParamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParamError';
  }
}

const firstQueryValue = (req: Request, name: string): string | undefined => {
  const raw = req.query[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
};

interface NumberParamRule {
  min?: number;
  max?: number;
  exclusive?: boolean;
  integer?: boolean;
}

/**
 * Reads an optional numeric query parameter. Missing values resolve to the
 * fallback; present but invalid values throw InvalidParamError.
 */
export const readNumberParam = (req: Request, name: string, fallback: number, rule: NumberParamRule = {}): number => {
  const raw = firstQueryValue(req, name);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || (rule.integer && !Number.isInteger(value))) {
    throw new InvalidParamError(`"${name}" must be a${rule.integer ? 'n integer' : ' number'}.`);
  }
  const { min, max, exclusive = false } = rule;
  const belowMin = min !== undefined && (exclusive ? value <= min : value < min);
  const aboveMax = max !== undefined && (exclusive ? value >= max : value > max);
  if (belowMin || aboveMax) {
    const open = exclusive ? '(' : '[';
    const close = exclusive ? ')' : ']';
    throw new InvalidParamError(`"${name}" must be within ${open}${min ?? '-∞'}, ${max ?? '∞'}${close}.`);
  }
  return value;
};

export const readStringParam = (req: Request, name: string): string => firstQueryValue(req, name) ?? '';
