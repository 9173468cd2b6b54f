// src/output_writer/index.ts

export * from "./types";
export { atomicWriteFileSync } from "./atomic_write";
export { extractModuleDigest, formatHeader, parseHeader, stripHeader } from "./header";
export { acquireBuildLock, releaseBuildLock } from "./lock";
export type { LockHandle } from "./lock";
export {
    cleanGeneratedDirs,
    generatedAbsPath,
    generatedRelPath,
    readGeneratedModule,
    writeGeneratedModule,
} from "./writer";
