/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the protocol compiler.
 * Values can be overridden via environment variables.
 */

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = parseInt(raw, 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Name written into generated files that carry a creator field
export const CREATOR_NAME = 'cycling-protocol-compiler';

// Canonical document schema version
export const CANONICAL_SCHEMA_VERSION = 'cycling-protocol-v1';

// Resolution cache (protocol fingerprint + capacity -> converted sequence)
export const RESOLUTION_CACHE = {
    MAX_ENTRIES: envInt('CYCLER_CACHE_MAX_ENTRIES', 256),
};

// Upper bound on steps produced when loops are unrolled
export const MAX_UNROLLED_STEPS = envInt('CYCLER_MAX_UNROLLED_STEPS', 10000);

// Biologic EC-Lab settings
export const BIOLOGIC = {
    COLUMN_WIDTH: 20,
    DEFAULT_VOLTAGE_RANGE_V: [0, 5] as const,
    COMPLIANCE_V: 10,
    DEVICE: 'MPG-2',
    // Range label -> full scale in mA, smallest first
    CURRENT_RANGES_MA: [
        { label: '10 µA', max_mA: 0.01 },
        { label: '100 µA', max_mA: 0.1 },
        { label: '1 mA', max_mA: 1 },
        { label: '10 mA', max_mA: 10 },
        { label: '100 mA', max_mA: 100 },
        { label: '1 A', max_mA: 1000 },
    ] as const,
    // Constant current control is limited to this range
    MAX_CC_RANGE_MA: 100,
};

// Neware BTS step file
export const NEWARE = {
    FILE_VERSION: '17',
    CLIENT_VERSION: 'BTS Client 8.0.0.478(2024.06.24)(R3)',
    // 103 = absolute current mode
    RATE_TYPE: '103',
};

// tomato job files
export const TOMATO = {
    VERSION: '0.1',
    DEVICE: 'MPG2',
    OUTPUT_DIR: process.env.CYCLER_TOMATO_OUTPUT_DIR || 'C:/tomato_data/',
    I_RANGE: '10 mA',
    E_RANGE: '+-5.0 V',
};

// BattINFO JSON-LD
export const BATTINFO_CONTEXT_URL = 'https://w3id.org/emmo/domain/battery/context';
