export type Vector3 = [number, number, number];

export type FieldParser<T> = (value: unknown, fieldName: string) => T;

export function valueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

export class ValidationError extends Error {
  field: string;
  receivedType: string;

  constructor(field: string, message: string, receivedType: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
    this.receivedType = receivedType;
  }
}

function fail(fieldName: string, expected: string, value: unknown): never {
  const receivedType = valueType(value);
  throw new ValidationError(
    fieldName,
    `Invalid field "${fieldName}": expected ${expected}, got ${receivedType}`,
    receivedType,
  );
}

function optional<T>(parser: FieldParser<T>): FieldParser<T | undefined> {
  return (value, fieldName) => {
    if (value === undefined || value === null) return undefined;
    return parser(value, fieldName);
  };
}

export function asString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') fail(fieldName, 'string', value);
  return value;
}

export function asNonEmptyString(value: unknown, fieldName: string): string {
  const s = asString(value, fieldName);
  if (s.trim().length === 0) {
    throw new ValidationError(
      fieldName,
      `Invalid field "${fieldName}": expected non-empty string`,
      valueType(value),
    );
  }
  return s;
}

export const asOptionalString = optional(asString);

export function asNumber(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value))
    fail(fieldName, 'number', value);
  return value;
}

export const asOptionalNumber = optional(asNumber);

export function asPositiveInteger(value: unknown, fieldName: string): number {
  const n = asNumber(value, fieldName);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ValidationError(
      fieldName,
      `Invalid field "${fieldName}": expected positive integer`,
      valueType(value),
    );
  }
  return n;
}

export const asOptionalPositiveInteger = optional(asPositiveInteger);

export function asRecord(
  value: unknown,
  fieldName: string,
): Record<string, unknown> {
  if (!isRecord(value)) fail(fieldName, 'object', value);
  return value;
}

export const asOptionalRecord = optional(asRecord);

export function asVector3(value: unknown, fieldName: string): Vector3 {
  if (!Array.isArray(value) || value.length !== 3) {
    throw new ValidationError(
      fieldName,
      `Invalid field "${fieldName}": expected list of 3 numbers`,
      valueType(value),
    );
  }
  return [
    asNumber(value[0], `${fieldName}[0]`),
    asNumber(value[1], `${fieldName}[1]`),
    asNumber(value[2], `${fieldName}[2]`),
  ];
}

export const asOptionalVector3 = optional(asVector3);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

/** True when a namespace name could climb out of the action directory. */
export function hasPathEscape(name: string): boolean {
  return name.includes('..') || name.includes('/') || name.includes('\\');
}
