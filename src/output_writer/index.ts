// src/output_writer/index.ts

export { atomicWriteFileSync } from "./atomic_write";
export type { AtomicWriteParams, FsyncMode } from "./atomic_write";
export { stableStringify } from "./stable_stringify";
export { encodeCp1252, encodeText, findUnencodable } from "./text_encoding";
export type { TextEncoding } from "./text_encoding";
export { writeArtifact } from "./writer";
export * from "./types";
