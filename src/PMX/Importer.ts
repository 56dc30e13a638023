
import { readFileSync } from "node:fs";
import ArrayBufferSlice from "../ArrayBufferSlice.js";
import { FileUnreadableError, type ImportError, isImportError } from "./Errors.js";
import { decode, DEFAULT_MAX_SECTION_COUNT } from "./PMX.js";
import type { SceneCollaborator, SceneHandleTypes } from "./Scene.js";
import { type BuildStage, type ImportSummary, SceneBuilder, type SceneBuildOptions } from "./SceneBuilder.js";

export interface ImportOptions extends SceneBuildOptions {
    maxSectionCount: number;
    // Log warnings, the completion line and failures to the console.
    verbose: boolean;
}

export const defaultImportOptions: Readonly<ImportOptions> = {
    scale: 1.0,
    importPhysics: true,
    importMorphs: true,
    swapYZ: true,
    minimumBoneLength: 0.001,
    maxSectionCount: DEFAULT_MAX_SECTION_COUNT,
    verbose: true,
};

export function resolveImportOptions(options: Partial<ImportOptions> = {}): ImportOptions {
    const resolved: ImportOptions = { ...defaultImportOptions, ...options };
    if (!Number.isFinite(resolved.scale) || resolved.scale <= 0)
        throw new RangeError(`scale must be a finite positive number, got ${resolved.scale}`);
    if (!Number.isFinite(resolved.minimumBoneLength) || resolved.minimumBoneLength <= 0)
        throw new RangeError(`minimumBoneLength must be a finite positive number, got ${resolved.minimumBoneLength}`);
    if (!Number.isInteger(resolved.maxSectionCount) || resolved.maxSectionCount < 0)
        throw new RangeError(`maxSectionCount must be a non-negative integer, got ${resolved.maxSectionCount}`);
    return resolved;
}

export type ImportStage = "decode" | BuildStage;

export const importStages: ReadonlyArray<ImportStage> = ["decode", "vertices", "materials", "faces", "bones", "morphs", "physics", "finalize"];

// step counts from 1.
export type ProgressSink = (stage: ImportStage, step: number, totalSteps: number) => void;

export type ImportResult =
    | { readonly ok: true; readonly summary: ImportSummary; }
    | { readonly ok: false; readonly error: ImportError; };

function failed(error: ImportError, verbose: boolean): ImportResult {
    if (verbose)
        console.error(`PMX import failed: ${error.message}`);
    return { ok: false, error };
}

/**
 * Decode a PMX file held in memory and rebuild it in the target scene. Files that cannot be
 * imported come back as a failed result; whatever was built before the failure stays in the scene.
 *
 * @throws {RangeError} on invalid options
 */
export function importModelFromBuffer<H extends SceneHandleTypes>(target: SceneCollaborator<H>, buffer: ArrayBufferSlice, options: Partial<ImportOptions> = {}, progress?: ProgressSink): ImportResult {
    const resolved = resolveImportOptions(options);
    const report = (stage: ImportStage) => {
        if (progress !== undefined)
            progress(stage, importStages.indexOf(stage) + 1, importStages.length);
    };

    const start = performance.now();
    let summary: ImportSummary;
    try {
        const doc = decode(buffer, { maxSectionCount: resolved.maxSectionCount });
        report("decode");
        summary = new SceneBuilder(doc, target, resolved).build(report);
    } catch (e) {
        if (isImportError(e))
            return failed(e, resolved.verbose);
        throw e;
    }

    if (resolved.verbose) {
        for (const warning of summary.warnings)
            console.warn(`PMX import: ${warning.section}: ${warning.message}`);
        const elapsed = (performance.now() - start) / 1000;
        console.log(`PMX import of ${summary.modelName} completed in ${elapsed.toFixed(2)}s`);
    }

    return { ok: true, summary };
}

/**
 * Read a PMX file from disk and import it. See {@link importModelFromBuffer}.
 */
export function importModel<H extends SceneHandleTypes>(target: SceneCollaborator<H>, filepath: string, options: Partial<ImportOptions> = {}, progress?: ProgressSink): ImportResult {
    const resolved = resolveImportOptions(options);

    let data: Uint8Array;
    try {
        data = readFileSync(filepath);
    } catch (e) {
        return failed(new FileUnreadableError(filepath, e), resolved.verbose);
    }

    return importModelFromBuffer(target, ArrayBufferSlice.fromUint8Array(data), resolved, progress);
}
