import { ValidationError } from "./errors.js";

export type QuantityFormat = "BinarySI" | "DecimalSI";

export interface ParsedQuantity {
  /** Whole bytes, rounded up. */
  bytes: bigint;
  format: QuantityFormat;
}

const QUANTITY_RE = /^([+-]?)(\d+(?:\.\d*)?|\.\d+)(Ki|Mi|Gi|Ti|Pi|Ei|m|k|M|G|T|P|E|[eE][+-]?\d+)?$/;
const BARE_INTEGER_RE = /^\d+$/;
const LEGACY_DECIMAL_RE = /^(\d+)\s*(GB|MB)$/i;

const BINARY_SUFFIXES: Array<[string, bigint]> = [
  ["Ei", 1n << 60n],
  ["Pi", 1n << 50n],
  ["Ti", 1n << 40n],
  ["Gi", 1n << 30n],
  ["Mi", 1n << 20n],
  ["Ki", 1n << 10n]
];

const DECIMAL_SUFFIXES: Array<[string, bigint]> = [
  ["E", 10n ** 18n],
  ["P", 10n ** 15n],
  ["T", 10n ** 12n],
  ["G", 10n ** 9n],
  ["M", 10n ** 6n],
  ["k", 10n ** 3n]
];

const MIB = 1n << 20n;
/** Largest value a Kubernetes quantity can carry. */
export const MAX_QUANTITY_BYTES = (1n << 63n) - 1n;
const MAX_EXPONENT = 18;
export const MIN_MEMORY_BYTES = MIB;

function suffixScale(suffix: string): { numerator: bigint; denominator: bigint; format: QuantityFormat } {
  const binary = BINARY_SUFFIXES.find(([s]) => s === suffix);
  if (binary) return { numerator: binary[1], denominator: 1n, format: "BinarySI" };
  const decimal = DECIMAL_SUFFIXES.find(([s]) => s === suffix);
  if (decimal) return { numerator: decimal[1], denominator: 1n, format: "DecimalSI" };
  if (suffix === "m") return { numerator: 1n, denominator: 1000n, format: "DecimalSI" };
  if (suffix === "") return { numerator: 1n, denominator: 1n, format: "DecimalSI" };
  const exponent = Number(suffix.slice(1));
  return exponent >= 0
    ? { numerator: 10n ** BigInt(exponent), denominator: 1n, format: "DecimalSI" }
    : { numerator: 1n, denominator: 10n ** BigInt(-exponent), format: "DecimalSI" };
}

/**
 * Parses a Kubernetes resource quantity ("512Mi", "1.5G", "2e9") into whole bytes.
 * Returns null when the string is not a quantity.
 */
export function parseQuantity(input: string): ParsedQuantity | null {
  const match = QUANTITY_RE.exec(input.trim());
  if (!match) return null;
  const [, sign, digits, suffix = ""] = match;
  if (/^[eE]/.test(suffix) && Math.abs(Number(suffix.slice(1))) > MAX_EXPONENT) return null;
  const [whole = "", fraction = ""] = digits.split(".");
  const mantissa = BigInt(`${whole}${fraction}` || "0");
  const fractionScale = 10n ** BigInt(fraction.length);
  const { numerator, denominator, format } = suffixScale(suffix);

  const num = mantissa * numerator;
  const den = fractionScale * denominator;
  let bytes = num / den;
  if (num % den !== 0n) bytes += 1n;
  if (sign === "-") bytes = -bytes;
  return { bytes, format };
}

/** Renders bytes with the largest suffix of the given family that divides them exactly. */
export function formatQuantity(bytes: bigint, format: QuantityFormat): string {
  if (bytes === 0n) return "0";
  const table = format === "BinarySI" ? BINARY_SUFFIXES : DECIMAL_SUFFIXES;
  for (const [suffix, factor] of table) {
    if (bytes % factor === 0n) return `${bytes / factor}${suffix}`;
  }
  return bytes.toString();
}

/**
 * Accepts the memory notations clients send and returns a canonical quantity:
 * a bare integer is MiB, a native quantity keeps its family, GB/MB are exact decimal units.
 */
export function parseMemorySize(input: string): string {
  const value = input.trim();
  if (!value) {
    throw new ValidationError("memory must not be empty");
  }

  let parsed: ParsedQuantity | null = null;
  if (BARE_INTEGER_RE.test(value)) {
    parsed = { bytes: BigInt(value) * MIB, format: "BinarySI" };
  } else {
    parsed = parseQuantity(value);
    if (!parsed) {
      const legacy = LEGACY_DECIMAL_RE.exec(value);
      if (legacy) {
        const factor = legacy[2].toUpperCase() === "GB" ? 10n ** 9n : 10n ** 6n;
        parsed = { bytes: BigInt(legacy[1]) * factor, format: "DecimalSI" };
      }
    }
  }

  if (!parsed) {
    throw new ValidationError(`invalid memory quantity: ${JSON.stringify(input)}`);
  }
  if (parsed.bytes <= 0n) {
    throw new ValidationError(`memory must be greater than zero: ${JSON.stringify(input)}`);
  }
  if (parsed.bytes < MIN_MEMORY_BYTES) {
    throw new ValidationError(`memory must be at least 1Mi: ${JSON.stringify(input)}`);
  }
  if (parsed.bytes > MAX_QUANTITY_BYTES) {
    throw new ValidationError(`memory exceeds the largest representable quantity: ${JSON.stringify(input)}`);
  }
  return formatQuantity(parsed.bytes, parsed.format);
}
