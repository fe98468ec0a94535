/**
 * Cloud Audit Core - Input Validation
 *
 * Tool arguments arrive as untyped JSON. Every helper here takes `unknown`,
 * trims and strips control characters, and throws ValidationError on
 * anything it cannot accept.
 */

import { ValidationError } from './errors.js';

export const REGION_PATTERN = /^[a-z]{2}(-gov|-iso[a-z]?)?-[a-z]+-\d+$/;

const MAX_ARN_LENGTH = 2048;
const MAX_LIST_LENGTH = 100;

export type OutputFormat = 'markdown' | 'json';

export interface InputRules {
  required?: boolean;
  maxLength?: number;
  pattern?: RegExp;
  patternName?: string;
  allowedValues?: readonly string[];
}

const CONTROL_CHARACTERS = /[\x00-\x1f\x7f]/g;

function sanitize(value: string): string {
  return value.replace(CONTROL_CHARACTERS, '').trim();
}

/**
 * Validate a single string input. Returns undefined for an absent optional
 * value.
 */
export function validateInput(value: unknown, rules: InputRules = {}): string | undefined {
  if (value === undefined || value === null || value === '') {
    if (rules.required) {
      throw new ValidationError('Required input is missing');
    }
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError('Input must be a string', { received: typeof value });
  }

  const cleaned = sanitize(value);
  if (rules.required && cleaned === '') {
    throw new ValidationError('Required input is missing');
  }
  if (rules.maxLength !== undefined && cleaned.length > rules.maxLength) {
    throw new ValidationError('Input exceeds maximum length', { maxLength: rules.maxLength, length: cleaned.length });
  }
  if (rules.pattern && !rules.pattern.test(cleaned)) {
    throw new ValidationError(`Invalid ${rules.patternName ?? 'input'} format`, { value: cleaned });
  }
  if (rules.allowedValues && !rules.allowedValues.includes(cleaned)) {
    throw new ValidationError('Invalid value', { value: cleaned, allowedValues: [...rules.allowedValues] });
  }
  return cleaned;
}

export function validateRegion(value: unknown, required = false): string | undefined {
  const region = validateInput(value, { required, maxLength: 32 });
  if (region === undefined) return undefined;

  const lowered = region.toLowerCase();
  if (!REGION_PATTERN.test(lowered)) {
    throw new ValidationError(`Invalid AWS region: ${region}`, { region }, 'Use a region code such as us-east-1.');
  }
  return lowered;
}

function toList(value: unknown, name: string): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    return value.split(',').map(item => item.trim()).filter(item => item !== '');
  }
  throw new ValidationError(`${name} must be a list or a comma-separated string`, { received: typeof value });
}

function withinListLimit(items: unknown[], name: string): unknown[] {
  if (items.length > MAX_LIST_LENGTH) {
    throw new ValidationError(`Too many ${name}`, { maximum: MAX_LIST_LENGTH, received: items.length });
  }
  return items;
}

/** Regions as an array or a comma-separated string; duplicates dropped, order kept */
export function validateRegionList(value: unknown): string[] {
  const regions: string[] = [];
  for (const item of withinListLimit(toList(value, 'regions'), 'regions')) {
    const region = validateRegion(item, true);
    if (region && !regions.includes(region)) {
      regions.push(region);
    }
  }
  return regions;
}

/**
 * ARNs as an array or a comma-separated string. Only shape is checked here;
 * the positional grammar is enforced by the scope resolver.
 */
export function validateArnList(value: unknown): string[] {
  const arns: string[] = [];
  for (const item of withinListLimit(toList(value, 'resourceArns'), 'resource ARNs')) {
    const arn = validateInput(item, {
      required: true,
      maxLength: MAX_ARN_LENGTH,
      pattern: /^arn:/,
      patternName: 'ARN',
    });
    if (arn && !arns.includes(arn)) {
      arns.push(arn);
    }
  }
  return arns;
}

export function validateOutputFormat(value: unknown): OutputFormat {
  const format = validateInput(value, { allowedValues: ['markdown', 'json'] });
  return format === 'json' ? 'json' : 'markdown';
}
