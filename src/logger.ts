/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when CYCLER_LOG_JSON=1
 * - Optional file output via CYCLER_LOG_FILE
 * - Component name (and bound fields) on every line
 *
 * Environment:
 *   CYCLER_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   CYCLER_LOG_JSON   = 1 (default: text)
 *   CYCLER_LOG_FILE   = path (optional, appends)
 *   CYCLER_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function parseLevel(raw: string | undefined): number {
    const v = (raw || 'info').toLowerCase();
    if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error' || v === 'silent') return LEVEL_ORDER[v];
    return LEVEL_ORDER.info;
}

const MIN_LEVEL = parseLevel(process.env.CYCLER_LOG_LEVEL);
const DEBUG_OVERRIDE = process.env.CYCLER_DEBUG === '1' || process.env.CYCLER_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.CYCLER_LOG_JSON === '1';
const LOG_FILE = process.env.CYCLER_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(
    level: LogLevel,
    component: string,
    bindings: Record<string, unknown>,
    message: string,
    data?: Record<string, unknown>
): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();
    const hasBindings = Object.keys(bindings).length > 0;

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (hasBindings) Object.assign(entry, bindings);
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = hasBindings
            ? ' [' + Object.entries(bindings).map(([k, v]) => `${k}=${String(v)}`).join(' ') + ']'
            : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e: unknown) {
            const code = e instanceof Error && 'code' in e ? String(e.code) : 'UNKNOWN';
            process.stderr.write(`[logger] cannot append to ${LOG_FILE} (${code})\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string, bindings?: Record<string, unknown>): Logger;
}

export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
    return {
        debug: (msg, data) => emit('debug', component, bindings, msg, data),
        info:  (msg, data) => emit('info',  component, bindings, msg, data),
        warn:  (msg, data) => emit('warn',  component, bindings, msg, data),
        error: (msg, data) => emit('error', component, bindings, msg, data),
        child: (sub, extra = {}) => createLogger(`${component}:${sub}`, { ...bindings, ...extra }),
    };
}
