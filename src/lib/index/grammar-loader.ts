import * as fs from "node:fs";
import * as path from "node:path";

import { PATHS } from "../../config";
import type { LanguageDefinition } from "../core/languages";
import { GrammarLoadError } from "../errors";

/**
 * Locate the compiled grammar shipped inside the grammar's npm package.
 * Nothing is downloaded: the file must already be in node_modules, or be
 * named by RUST_SKELETON_GRAMMAR_WASM.
 */
export function resolveGrammarWasm(lang: LanguageDefinition): string {
    if (PATHS.grammarOverride) {
        if (!fs.existsSync(PATHS.grammarOverride)) {
            throw new GrammarLoadError(PATHS.grammarOverride);
        }
        return PATHS.grammarOverride;
    }

    const { packageName, wasmFile } = lang.grammar;
    try {
        return require.resolve(`${packageName}/${wasmFile}`);
    } catch {
        try {
            const pkgDir = path.dirname(
                require.resolve(`${packageName}/package.json`),
            );
            const candidate = path.join(pkgDir, wasmFile);
            if (fs.existsSync(candidate)) return candidate;
        } catch {
            // package not resolvable from here; try the project tree
        }
    }

    const fallback = path.join(
        __dirname,
        "..",
        "..",
        "..",
        "node_modules",
        packageName,
        wasmFile,
    );
    if (!fs.existsSync(fallback)) {
        throw new GrammarLoadError(fallback);
    }
    return fallback;
}
