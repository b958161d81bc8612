/**
 * Rule Sets
 * Named predicates evaluated against a frozen snapshot of a decoded candidate.
 * Every rule runs; failures are collected rather than short-circuited, so the
 * order of a rule list never changes the verdict.
 */

import type { ValidationIssue } from '../types/index.js';

export interface ValidationRule<T> {
  /** Stable identifier reported to clients, e.g. `price.range` */
  name: string;
  field: Extract<keyof T, string>;
  check: (candidate: Readonly<T>) => boolean;
  message: string;
  /** Renders the offending value; defaults to the raw field value */
  value?: (candidate: Readonly<T>) => unknown;
}

/**
 * Evaluate every rule and return the failures
 * @param prefix - field path prefix for nested values, e.g. `items.2`
 */
export function evaluateRules<T extends object>(
  rules: readonly ValidationRule<T>[],
  candidate: T,
  prefix: string = ''
): ValidationIssue[] {
  const snapshot: Readonly<T> = Object.freeze({ ...candidate });
  const issues: ValidationIssue[] = [];

  for (const rule of rules) {
    if (rule.check(snapshot)) {
      continue;
    }

    issues.push({
      field: prefix ? `${prefix}.${rule.field}` : rule.field,
      rule: rule.name,
      message: rule.message,
      value: rule.value ? rule.value(snapshot) : snapshot[rule.field],
    });
  }

  return issues;
}

/**
 * Length in characters (code points), so a surrogate pair counts once
 */
export function characterCount(value: string): number {
  return [...value].length;
}

/**
 * Inclusive length check for strings, counted in characters
 */
export function lengthBetween(value: string, min: number, max: number): boolean {
  const length = characterCount(value);
  return length >= min && length <= max;
}

export function lengthAtMost(value: string | undefined, max: number): boolean {
  return value === undefined || characterCount(value) <= max;
}

/**
 * Inclusive range check for numbers
 */
export function between(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}
