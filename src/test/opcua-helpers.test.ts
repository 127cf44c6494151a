import { describe, expect, it } from 'vitest';
import { LocalizedText, NodeClass } from 'node-opcua';

import {
    accessLevelLabel,
    errorMessage,
    formatValue,
    int64FromWords,
    nodeClassName,
    widenInt64,
} from '../opcua/opcua-helpers';

describe('accessLevelLabel', () => {
    it('is Writable when the CurrentWrite bit is set', () => {
        expect(accessLevelLabel(0x02)).toBe('Writable');
        expect(accessLevelLabel(0x03)).toBe('Writable');
    });

    it('is Read-only without the CurrentWrite bit', () => {
        expect(accessLevelLabel(0x01)).toBe('Read-only');
        expect(accessLevelLabel(0)).toBe('Read-only');
    });

    it('is Unknown when no access level is available', () => {
        expect(accessLevelLabel(null)).toBe('Unknown');
        expect(accessLevelLabel(undefined)).toBe('Unknown');
        expect(accessLevelLabel(Number.NaN)).toBe('Unknown');
    });
});

describe('nodeClassName', () => {
    it('uses the enum member name', () => {
        expect(nodeClassName(NodeClass.Variable)).toBe('Variable');
        expect(nodeClassName(NodeClass.Object)).toBe('Object');
        expect(nodeClassName(NodeClass.Method)).toBe('Method');
    });

    it('is Unknown for values outside the enum', () => {
        const notANodeClass: number = 3;
        expect(nodeClassName(notANodeClass)).toBe('Unknown');
    });
});

describe('formatValue', () => {
    it('prints scalars as they are', () => {
        expect(formatValue('running')).toBe('running');
        expect(formatValue(42.5)).toBe('42.5');
        expect(formatValue(false)).toBe('false');
        expect(formatValue(BigInt(12))).toBe('12');
    });

    it('prints missing values as null', () => {
        expect(formatValue(null)).toBe('null');
        expect(formatValue(undefined)).toBe('null');
    });

    it('prints byte strings as hex', () => {
        expect(formatValue(Buffer.from([0xde, 0xad, 0x01]))).toBe('0xdead01');
    });

    it('prints dates as ISO timestamps', () => {
        expect(formatValue(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02T03:04:05.000Z');
    });

    it('formats arrays and typed arrays element-wise', () => {
        expect(formatValue([1, 'two', null])).toBe('[1, two, null]');
        expect(formatValue(new Float32Array([1.5, 2]))).toBe('[1.5, 2]');
        expect(formatValue(new Uint16Array([]))).toBe('[]');
    });

    it('uses the toString of library types', () => {
        expect(formatValue(new LocalizedText({ text: 'Pump', locale: null }))).toBe(
            new LocalizedText({ text: 'Pump', locale: null }).toString(),
        );
    });

    it('prints plain objects as JSON', () => {
        expect(formatValue({ a: 1, b: 'x' })).toBe('{"a":1,"b":"x"}');
    });
});

describe('int64FromWords', () => {
    it('combines the high and low words', () => {
        expect(int64FromWords([1, 705032704], true)).toBe(BigInt(5000000000));
        expect(int64FromWords([0, 7], false)).toBe(BigInt(7));
    });

    it('reads the high bit as the sign only for Int64', () => {
        expect(int64FromWords([0xffffffff, 0xfffffffe], true)).toBe(BigInt(-2));
        expect(int64FromWords([0xffffffff, 0xfffffffe], false)).toBe(BigInt('18446744073709551614'));
    });

    it('is null for anything but a pair of integers', () => {
        expect(int64FromWords(42, true)).toBeNull();
        expect(int64FromWords([1, 2, 3], true)).toBeNull();
        expect(int64FromWords([1.5, 0], false)).toBeNull();
        expect(int64FromWords(['1', '0'], false)).toBeNull();
    });
});

describe('widenInt64', () => {
    it('widens scalars and arrays of word pairs', () => {
        expect(widenInt64([0, 9], false)).toBe(BigInt(9));
        expect(widenInt64([[0, 7], [1, 0]], false)).toEqual([BigInt(7), BigInt(4294967296)]);
        expect(formatValue(widenInt64([[0xffffffff, 0xffffffff]], true))).toBe('[-1]');
    });

    it('passes other values through', () => {
        expect(widenInt64(null, true)).toBeNull();
        expect(widenInt64('n/a', false)).toBe('n/a');
    });
});

describe('errorMessage', () => {
    it('takes the message of an Error and stringifies anything else', () => {
        expect(errorMessage(new Error('BadTimeout'))).toBe('BadTimeout');
        expect(errorMessage('plain')).toBe('plain');
        expect(errorMessage(404)).toBe('404');
    });
});
