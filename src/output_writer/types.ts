// src/output_writer/types.ts

export type ArtifactKind = "build" | "test";

/** Metadata embedded at the top of every generated file. */
export interface GeneratedHeader {
    toolVersion: string;
    kind: ArtifactKind;
    sourceModule: string;
    /** `sha256:<hex>` over the specs that produced the file. */
    moduleDigest: string;
    specRefs: string[];
}

export interface WriteModuleParams {
    /** Package root; nothing is ever written outside it. */
    packageDir: string;
    generatedDir: string;
    moduleName: string;
    source: string;
    header: GeneratedHeader;
}

export interface WriteModuleResult {
    path: string;
    bytes: number;
    warnings: string[];
}

export interface CleanParams {
    roots: string[];
    generatedDir: string;
    dryRun?: boolean;
}
