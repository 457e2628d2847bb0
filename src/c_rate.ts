/**
 * C-rate parsing
 *
 * Accepts plain numbers, numeric strings and fraction notation:
 *   "1/20" -> 0.05, "C/5" -> 0.2, "D/2" -> -0.5, "3D/3" -> -1, "C5/25" -> 0.2
 * Whitespace inside fraction strings is ignored. Blank input means "not set".
 */

import { StructuralError } from './structured_error';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function strictFloat(text: string): number | null {
    if (!DECIMAL.test(text)) return null;
    const value = Number(text);
    return Number.isFinite(value) ? value : null;
}

function invalid(value: unknown, path: string): StructuralError {
    return StructuralError.single('INVALID_C_RATE', `Invalid C-rate value: ${String(value)}`, path);
}

export function parseCRate(value: number | string | null | undefined, path = 'rate_C'): number | undefined {
    if (value === null || value === undefined) return undefined;

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) throw invalid(value, path);
        return value;
    }

    const trimmed = value.trim();
    if (trimmed === '') return undefined;

    const direct = strictFloat(trimmed);
    if (direct !== null) return direct;

    const compact = trimmed.replace(/\s+/g, '');
    const parts = compact.split('/');
    if (parts.length !== 2) throw invalid(value, path);

    const denominator = parts[1];
    let numerator = parts[0];
    const markers = (numerator.match(/[CD]/g) || []).length;
    if (markers > 1) throw invalid(value, path);

    let nominal: number | null;
    if (numerator.includes('C')) {
        numerator = numerator.replace('C', '');
        nominal = numerator === '' ? 1 : strictFloat(numerator);
    } else if (numerator.includes('D')) {
        numerator = numerator.replace('D', '');
        const magnitude = numerator === '' ? 1 : strictFloat(numerator);
        nominal = magnitude === null ? null : -magnitude;
    } else {
        nominal = strictFloat(numerator);
    }

    const denom = strictFloat(denominator);
    if (nominal === null || denom === null || denom === 0) throw invalid(value, path);

    return nominal / denom;
}
