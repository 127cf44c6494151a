import { types } from 'node:util';
import { AccessLevelFlag, NodeClass } from 'node-opcua';
import type { AccessLabel } from '../types';

export function accessLevelLabel(accessLevel: number | null | undefined): AccessLabel {
    if (accessLevel === null || accessLevel === undefined || !Number.isInteger(accessLevel)) {
        return 'Unknown';
    }
    return (accessLevel & AccessLevelFlag.CurrentWrite) !== 0 ? 'Writable' : 'Read-only';
}

export function nodeClassName(nodeClass: NodeClass): string {
    const name: string | undefined = NodeClass[nodeClass];
    return name ?? 'Unknown';
}

const WORD = BigInt(0x100000000);

/**
 * Combines the `[high, low]` 32-bit words node-opcua decodes Int64 and
 * UInt64 into. Returns null for anything that is not such a pair.
 */
export function int64FromWords(words: unknown, signed: boolean): bigint | null {
    if (!Array.isArray(words) || words.length !== 2) {
        return null;
    }
    const [high, low]: unknown[] = words;
    if (typeof high !== 'number' || typeof low !== 'number' || !Number.isInteger(high) || !Number.isInteger(low)) {
        return null;
    }
    const value = BigInt(high >>> 0) * WORD + BigInt(low >>> 0);
    return signed ? BigInt.asIntN(64, value) : value;
}

// Scalars and arrays of 64-bit integers; other values pass through.
export function widenInt64(value: unknown, signed: boolean): unknown {
    const scalar = int64FromWords(value, signed);
    if (scalar !== null) {
        return scalar;
    }
    if (Array.isArray(value)) {
        return value.map((item: unknown) => int64FromWords(item, signed) ?? item);
    }
    return value;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Renders a Variant value on one line. Arrays and typed arrays are
 * formatted element-wise; node-opcua types (LocalizedText, NodeId,
 * ExtensionObject, ...) use their own toString.
 */
export function formatValue(value: unknown): string {
    if (value === null || value === undefined) {
        return 'null';
    }
    if (typeof value === 'string') {
        return value;
    }
    if (Buffer.isBuffer(value)) {
        return `0x${value.toString('hex')}`;
    }
    if (value instanceof Date) {
        return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    }
    if (Array.isArray(value)) {
        return `[${value.map((item: unknown) => formatValue(item)).join(', ')}]`;
    }
    if (types.isTypedArray(value)) {
        const typed = value;
        const items = Array.from({ length: typed.length }, (_, index) => String(typed[index]));
        return `[${items.join(', ')}]`;
    }
    if (typeof value === 'object') {
        if (value.toString !== Object.prototype.toString) {
            return String(value);
        }
        return JSON.stringify(value);
    }
    return String(value);
}
