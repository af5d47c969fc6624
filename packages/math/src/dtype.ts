/**
 * DType - numeric precision of coordinate values
 *
 * Every coordinate system, batch and matrix carries one of these names.
 * Values are always held as JavaScript numbers; the dtype says which of them
 * are legal and how a number is converted when a value changes precision.
 *
 * @example
 * ```typescript
 * safeDType("uint8", "int8");       // "int16"
 * safeDType("int32", "float32");    // "float64"
 * canCast("float64", "float32");    // false
 * ```
 */

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Supported precisions, in promotion order.
 * `safeDType` returns the first entry every operand casts to safely.
 */
export const DTYPES = [
  "bool",
  "uint8",
  "int8",
  "uint16",
  "int16",
  "uint32",
  "int32",
  "float32",
  "float64",
] as const;

export type DType = (typeof DTYPES)[number];

export type DTypeKind = "bool" | "unsigned" | "signed" | "float";

interface DTypeInfo {
  readonly kind: DTypeKind;
  readonly bits: number;
}

const INFO: Readonly<Record<DType, DTypeInfo>> = {
  bool: { kind: "bool", bits: 1 },
  uint8: { kind: "unsigned", bits: 8 },
  int8: { kind: "signed", bits: 8 },
  uint16: { kind: "unsigned", bits: 16 },
  int16: { kind: "signed", bits: 16 },
  uint32: { kind: "unsigned", bits: 32 },
  int32: { kind: "signed", bits: 32 },
  float32: { kind: "float", bits: 32 },
  float64: { kind: "float", bits: 64 },
};

const FLOAT32_MAX = 3.4028234663852886e38;

/**
 * Thrown for unknown precision names or precisions without a common safe type.
 */
export class DTypeError extends Error {
  constructor(
    message: string,
    readonly dtypes: readonly string[] = []
  ) {
    super(message);
    this.name = "DTypeError";
  }
}

// ============================================================================
// Inspection
// ============================================================================

export function isDType(value: unknown): value is DType {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(INFO, value);
}

/**
 * Validate an untyped precision name.
 *
 * @throws DTypeError if `value` is not a supported precision
 */
export function toDType(value: unknown): DType {
  if (!isDType(value)) {
    throw new DTypeError(`Unknown dtype ${JSON.stringify(value)}`, [String(value)]);
  }
  return value;
}

export function kindOf(dtype: DType): DTypeKind {
  return INFO[dtype].kind;
}

export function bitsOf(dtype: DType): number {
  return INFO[dtype].bits;
}

export function isFloat(dtype: DType): boolean {
  return INFO[dtype].kind === "float";
}

export function isInteger(dtype: DType): boolean {
  const kind = INFO[dtype].kind;
  return kind === "signed" || kind === "unsigned";
}

// ============================================================================
// Casting Rules
// ============================================================================

/**
 * Whether every value of `from` is exactly representable in `to`.
 */
export function canCast(from: DType, to: DType): boolean {
  if (from === to) return true;

  const a = INFO[from];
  const b = INFO[to];

  if (a.kind === "bool") return true;
  if (b.kind === "bool") return false;

  switch (a.kind) {
    case "unsigned":
      if (b.kind === "unsigned") return b.bits >= a.bits;
      if (b.kind === "signed") return b.bits > a.bits;
      return b.bits === 64 || a.bits <= 16;
    case "signed":
      if (b.kind === "unsigned") return false;
      if (b.kind === "signed") return b.bits >= a.bits;
      return b.bits === 64 || a.bits <= 16;
    case "float":
      return b.kind === "float" && b.bits >= a.bits;
  }
}

/**
 * Least upper bound of a set of precisions under `canCast`.
 *
 * @throws DTypeError if no dtype is given, a name is unknown, or no
 * supported dtype holds all of them
 */
export function safeDType(...dtypes: readonly unknown[]): DType {
  if (dtypes.length === 0) {
    throw new DTypeError("safeDType requires at least one dtype");
  }
  const checked = dtypes.map(toDType);
  const promoted = DTYPES.find((candidate) => checked.every((d) => canCast(d, candidate)));
  if (promoted === undefined) {
    throw new DTypeError(`No dtype can safely hold ${checked.join(", ")}`, checked);
  }
  return promoted;
}

// ============================================================================
// Value Conversion
// ============================================================================

function integerRange(dtype: DType): [number, number] {
  const { kind, bits } = INFO[dtype];
  if (kind === "unsigned") return [0, 2 ** bits - 1];
  return [-(2 ** (bits - 1)), 2 ** (bits - 1) - 1];
}

/**
 * Convert a number to `dtype` the way a numeric cast does: floats round,
 * integers truncate toward zero and wrap around, booleans become 0 or 1.
 */
export function castValue(value: number, dtype: DType): number {
  const { kind, bits } = INFO[dtype];
  switch (kind) {
    case "float":
      return bits === 32 ? Math.fround(value) : value;
    case "bool":
      return value !== 0 && !Number.isNaN(value) ? 1 : 0;
    default: {
      if (!Number.isFinite(value)) return 0;
      const modulus = 2 ** bits;
      let wrapped = ((Math.trunc(value) % modulus) + modulus) % modulus;
      if (kind === "signed" && wrapped >= modulus / 2) wrapped -= modulus;
      return wrapped;
    }
  }
}

/**
 * Whether a plain number can be stored in `dtype` without losing its value.
 * Float precisions accept any number in range (rounding is not a loss of kind).
 */
export function isRepresentable(value: number, dtype: DType): boolean {
  const { kind, bits } = INFO[dtype];
  switch (kind) {
    case "float":
      return bits === 64 || !Number.isFinite(value) || Math.abs(value) <= FLOAT32_MAX;
    case "bool":
      return value === 0 || value === 1;
    default: {
      if (!Number.isInteger(value)) return false;
      const [min, max] = integerRange(dtype);
      return value >= min && value <= max;
    }
  }
}
