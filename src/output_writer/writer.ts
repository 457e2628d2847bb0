// src/output_writer/writer.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { ArtifactWriteError } from "../structured_error";
import { atomicWriteFileSync } from "./atomic_write";
import { encodeText } from "./text_encoding";
import { WriteArtifactRequest, WrittenArtifact } from "./types";

function rejectSymlink(p: string): void {
    if (!fs.existsSync(p)) return;
    if (fs.lstatSync(p).isSymbolicLink()) {
        throw new ArtifactWriteError(`Refusing to overwrite symbolic link ${p}`, "SYMLINK_REJECTED");
    }
}

/**
 * Encodes the text (which may fail before anything touches the disk) and
 * writes it atomically.
 */
export function writeArtifact(req: WriteArtifactRequest): WrittenArtifact {
    const filePath = path.resolve(req.file_path);
    const content = encodeText(req.text, req.encoding);

    rejectSymlink(filePath);

    const warnings: string[] = [];
    atomicWriteFileSync({
        filePath,
        content,
        mode: 0o644,
        fsyncMode: req.fsync ?? "BEST_EFFORT",
        warnings,
    });

    return {
        path: filePath,
        encoding: req.encoding,
        bytes: content.length,
        sha256: crypto.createHash("sha256").update(content).digest("hex"),
        warnings,
    };
}
