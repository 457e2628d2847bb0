// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { createLogger } from "../logger";
import { ArtifactWriteError } from "../structured_error";

const log = createLogger("atomic_write");

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function errnoOf(e: unknown): string | undefined {
    return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

export interface AtomicWriteParams {
    filePath: string;
    content: Buffer | string;
    mode?: number;
    fsyncMode?: FsyncMode;
    /** Non-fatal fsync problems are appended here. */
    warnings?: string[];
}

function syncPath(target: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(target, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e: unknown) {
        const code = errnoOf(e);
        if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${target}`);
    }
}

/**
 * Writes to a temp file beside the target, fsyncs it, then renames it over
 * the target. The temp file is removed on every failure path. Failures are
 * raised as ArtifactWriteError.
 */
export function atomicWriteFileSync(params: AtomicWriteParams): void {
    const { filePath, content, mode = 0o644, fsyncMode = "BEST_EFFORT", warnings = [] } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        syncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        // rename consumes tmp on POSIX

        fs.chmodSync(filePath, mode);

        if (process.platform !== "win32") {
            syncPath(dir, "r", fsyncMode, warnings);
        }
    } catch (e: unknown) {
        try {
            if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
        } catch (cleanup: unknown) {
            log.warn("Could not remove temp file", { tmp, code: errnoOf(cleanup) ?? "UNKNOWN" });
        }
        const code = errnoOf(e);
        const reason = e instanceof Error ? e.message : String(e);
        throw new ArtifactWriteError(`Failed to write ${filePath}: ${reason}`, code, e);
    }

    for (const w of warnings) log.warn(w);
}
