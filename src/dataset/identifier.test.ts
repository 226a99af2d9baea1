import { describe, it, expect, vi } from 'vitest';
import { identifier_normalize } from './identifier.js';

describe('identifier_normalize', (): void => {
    it('maps null and undefined to an empty string', (): void => {
        expect(identifier_normalize(null)).toBe('');
        expect(identifier_normalize(undefined)).toBe('');
    });

    it('renders integer-valued floats without a fractional part', (): void => {
        expect(identifier_normalize(354653661425023.0)).toBe('354653661425023');
    });

    it('keeps every digit of identifiers beyond exponent range', (): void => {
        expect(identifier_normalize(1e21)).toBe('1000000000000000000000');
    });

    it('preserves leading zeros in text identifiers', (): void => {
        expect(identifier_normalize('0012345678901234')).toBe('0012345678901234');
    });

    it('strips the float suffix once, only at the end', (): void => {
        expect(identifier_normalize('abc.0.0')).toBe('abc.0');
        expect(identifier_normalize('35465.0661425023')).toBe('35465.0661425023');
        expect(identifier_normalize('354653661425023.0')).toBe('354653661425023');
    });

    it('trims whitespace before looking for the suffix', (): void => {
        expect(identifier_normalize('  354653661425023.0 \t')).toBe('354653661425023');
    });

    it('maps non-finite numbers to an empty string', (): void => {
        expect(identifier_normalize(Number.NaN)).toBe('');
    });

    it('reports faults through the handler instead of throwing', (): void => {
        const onError = vi.fn<(raw: unknown, error: unknown) => void>();
        const hostile: { toString(): string } = {
            toString(): string {
                throw new Error('unprintable');
            }
        };

        expect(identifier_normalize(hostile, onError)).toBe('');
        expect(onError).toHaveBeenCalledTimes(1);
        expect(onError.mock.calls[0][0]).toBe(hostile);
    });
});
