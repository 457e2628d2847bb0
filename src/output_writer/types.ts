// src/output_writer/types.ts

import type { FsyncMode } from "./atomic_write";
import type { TextEncoding } from "./text_encoding";

export interface WriteArtifactRequest {
    file_path: string;
    text: string;
    encoding: TextEncoding;
    fsync?: FsyncMode;
}

export interface WrittenArtifact {
    path: string;
    encoding: TextEncoding;
    bytes: number;
    sha256: string;
    warnings: string[];
}
