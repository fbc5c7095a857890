/**
 * Typed value construction and conversion
 */

import { PhyloTreeError } from "./errors.js";
import type { RawValueOf, SmallIntegerKind, TypedValue, ValueKind } from "./types.js";

/**
 * All value kinds, in declaration order
 */
export const VALUE_KINDS: readonly ValueKind[] = [
    "int8", "uint8", "int16", "uint16", "int32", "uint32",
    "int64", "uint64", "float32", "float64", "boolean", "string", "opaque",
];

/**
 * Wrap a number into the range of a small integer kind.
 * Fractions are truncated, out-of-range values wrap, as typed arrays do.
 */
function fitSmallInteger(kind: SmallIntegerKind, n: number): number {
    switch (kind) {
        case "int8": return new Int8Array([n])[0];
        case "uint8": return new Uint8Array([n])[0];
        case "int16": return new Int16Array([n])[0];
        case "uint16": return new Uint16Array([n])[0];
        case "int32": return new Int32Array([n])[0];
        case "uint32": return new Uint32Array([n])[0];
    }
}

function toBigInt(kind: ValueKind, raw: unknown): bigint {
    if (typeof raw === "bigint") return raw;
    if (typeof raw === "number" && Number.isInteger(raw)) return BigInt(raw);
    throw new PhyloTreeError(
        `Expected an integer for kind ${kind}`,
        "typedValue",
        { kind, raw }
    );
}

function expectNumber(kind: ValueKind, raw: unknown): number {
    if (typeof raw === "number") return raw;
    throw new PhyloTreeError(
        `Expected a number for kind ${kind}`,
        "typedValue",
        { kind, raw }
    );
}

function fromUnknown(kind: ValueKind, raw: unknown): TypedValue {
    switch (kind) {
        case "int8":
        case "uint8":
        case "int16":
        case "uint16":
        case "int32":
        case "uint32":
            return { kind, value: fitSmallInteger(kind, expectNumber(kind, raw)) };
        case "int64":
            return { kind, value: BigInt.asIntN(64, toBigInt(kind, raw)) };
        case "uint64":
            return { kind, value: BigInt.asUintN(64, toBigInt(kind, raw)) };
        case "float32":
            return { kind, value: Math.fround(expectNumber(kind, raw)) };
        case "float64":
            return { kind, value: expectNumber(kind, raw) };
        case "boolean":
            if (typeof raw !== "boolean") {
                throw new PhyloTreeError("Expected a boolean", "typedValue", { kind, raw });
            }
            return { kind, value: raw };
        case "string":
            if (typeof raw !== "string") {
                throw new PhyloTreeError("Expected a string", "typedValue", { kind, raw });
            }
            return { kind, value: raw };
        case "opaque":
            return { kind, value: raw };
    }
}

/**
 * Build a typed value of the given kind from a plain JS value.
 * Throws PhyloTreeError when the JS type cannot hold the kind.
 */
export function typedValue<K extends ValueKind>(kind: K, raw: RawValueOf<K>): TypedValue {
    return fromUnknown(kind, raw);
}

/**
 * Build a typed value when the raw value's type is only known at runtime
 */
export function typedValueFromUnknown(kind: ValueKind, raw: unknown): TypedValue {
    return fromUnknown(kind, raw);
}

/**
 * The value a row takes when nothing was stored for it
 */
export function emptyValue(kind: ValueKind): TypedValue {
    switch (kind) {
        case "boolean": return { kind, value: false };
        case "string": return { kind, value: "" };
        case "opaque": return { kind, value: null };
        case "int64":
        case "uint64":
            return { kind, value: 0n };
        default:
            return { kind, value: 0 };
    }
}

function opaqueToString(value: unknown): string {
    if (value === null || value === undefined) return "";
    if (typeof value === "string") return value;
    if (typeof value !== "object") return String(value);
    try {
        return JSON.stringify(value, (_key, v: unknown) => typeof v === "bigint" ? v.toString() : v);
    } catch {
        // cyclic structures
        return String(value);
    }
}

/**
 * Text form of a value
 */
export function valueToString(value: TypedValue): string {
    switch (value.kind) {
        case "float32":
            return String(Number(value.value.toPrecision(7)));
        case "boolean":
            return value.value ? "true" : "false";
        case "string":
            return value.value;
        case "opaque":
            return opaqueToString(value.value);
        default:
            return value.value.toString();
    }
}

function parseNumber(text: string): number {
    if (text.trim() === "") return 0;
    const n = Number(text);
    return Number.isNaN(n) ? 0 : n;
}

/**
 * Numeric form of a value. Anything that does not parse as a number is 0.
 */
export function valueToNumber(value: TypedValue): number {
    switch (value.kind) {
        case "int64":
        case "uint64":
            return Number(value.value);
        case "boolean":
            return value.value ? 1 : 0;
        case "string":
            return parseNumber(value.value);
        case "opaque": {
            const raw = value.value;
            if (typeof raw === "number") return raw;
            if (typeof raw === "bigint") return Number(raw);
            if (typeof raw === "boolean") return raw ? 1 : 0;
            if (typeof raw === "string") return parseNumber(raw);
            return 0;
        }
        default:
            return value.value;
    }
}

/**
 * Name of the value's kind
 */
export function valueTypeName(value: TypedValue): ValueKind {
    return value.kind;
}
