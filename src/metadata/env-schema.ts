import type { Env, FieldValue } from '../types';
import { EnvValidationError } from '../errors';

/**
 * Declarative binding of environment variables to typed, serializable fields.
 *
 * Each CI provider describes its variables as an ordered table of EnvField
 * entries. parseEnv() interprets a table against the environment, and
 * serializableFields() turns the parsed values (plus any derived values) into
 * the ordered key/value record written to the metadata document.
 */

export type FieldType = 'string' | 'uint' | 'bool';

export interface EnvField {
  type: FieldType;
  /** Variable to read; absent for fields computed after parsing */
  variable?: string;
  /** Output key; absent for variables that are read but not written out */
  key?: string;
  /** Fail when the variable is unset or empty */
  required?: boolean;
  /** Leave the key out of the output when the value is empty/zero */
  omitEmpty?: boolean;
}

export interface FieldOptions {
  required?: boolean;
  omitEmpty?: boolean;
}

export function str(variable: string, key?: string, options: FieldOptions = {}): EnvField {
  return { type: 'string', variable, key, ...options };
}

export function uint(variable: string, key?: string, options: FieldOptions = {}): EnvField {
  return { type: 'uint', variable, key, ...options };
}

export function bool(variable: string, key?: string, options: FieldOptions = {}): EnvField {
  return { type: 'bool', variable, key, ...options };
}

/** A field whose value is computed by the provider rather than read directly */
export function derived(key: string, type: FieldType, options: FieldOptions = {}): EnvField {
  return { type, key, ...options };
}

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

export function zeroValue(type: FieldType): FieldValue {
  switch (type) {
    case 'uint':
      return 0;
    case 'bool':
      return false;
    case 'string':
      return '';
  }
}

export function isEmptyValue(value: FieldValue): boolean {
  return value === '' || value === 0 || value === false;
}

/**
 * Parse a raw variable as the given type; undefined when it doesn't fit.
 */
export function parseValue(type: FieldType, raw: string): FieldValue | undefined {
  switch (type) {
    case 'string':
      return raw;
    case 'uint': {
      // Values past 2^53 are rejected rather than rounded
      if (!/^\d+$/.test(raw)) return undefined;
      const value = Number(raw);
      return Number.isSafeInteger(value) ? value : undefined;
    }
    case 'bool':
      if (TRUE_VALUES.has(raw)) return true;
      if (FALSE_VALUES.has(raw)) return false;
      return undefined;
  }
}

const TYPE_DESCRIPTIONS: Record<FieldType, string> = {
  string: 'a string',
  uint: 'an unsigned integer',
  bool: 'a boolean',
};

/**
 * Typed access to the values produced by parseEnv(). Variables that were not
 * declared in the table read as the zero value of the requested type.
 */
export class ParsedEnv {
  constructor(private readonly values: ReadonlyMap<string, FieldValue>) {}

  value(variable: string): FieldValue | undefined {
    return this.values.get(variable);
  }

  string(variable: string): string {
    const value = this.values.get(variable);
    return typeof value === 'string' ? value : '';
  }

  uint(variable: string): number {
    const value = this.values.get(variable);
    return typeof value === 'number' ? value : 0;
  }
}

/**
 * Read every variable declared in `fields` from `env`.
 *
 * Unset and empty variables take the zero value of their type. All problems
 * (required variables missing, values that don't parse) are collected and
 * thrown together as one EnvValidationError.
 */
export function parseEnv(fields: readonly EnvField[], env: Env): ParsedEnv {
  const values = new Map<string, FieldValue>();
  const problems: string[] = [];

  for (const field of fields) {
    if (field.variable === undefined) continue;

    const raw = env[field.variable];
    if (raw === undefined || raw === '') {
      if (field.required) {
        problems.push(`environment variable "${field.variable}" should not be empty`);
      } else {
        values.set(field.variable, zeroValue(field.type));
      }
      continue;
    }

    const parsed = parseValue(field.type, raw);
    if (parsed === undefined) {
      problems.push(
        `parse error on environment variable "${field.variable}": expected ${TYPE_DESCRIPTIONS[field.type]}, got "${raw}"`
      );
      continue;
    }
    values.set(field.variable, parsed);
  }

  if (problems.length > 0) {
    throw new EnvValidationError(problems);
  }

  return new ParsedEnv(values);
}

export type SerializableFields = Readonly<Record<string, FieldValue>>;

/**
 * Assemble the output record for a table, in table order. Derived fields take
 * their value from `derivedValues` (zero value when absent). Fields marked
 * omitEmpty are dropped when empty.
 */
export function serializableFields(
  fields: readonly EnvField[],
  parsed: ParsedEnv,
  derivedValues: Readonly<Record<string, FieldValue>> = {}
): SerializableFields {
  const record: Record<string, FieldValue> = {};

  for (const field of fields) {
    if (field.key === undefined) continue;

    const value =
      (field.variable !== undefined ? parsed.value(field.variable) : derivedValues[field.key]) ??
      zeroValue(field.type);

    if (field.omitEmpty && isEmptyValue(value)) continue;
    record[field.key] = value;
  }

  return record;
}
