export interface LanguageDefinition {
    id: string;
    grammar: {
        /** npm package that ships the compiled grammar */
        packageName: string;
        wasmFile: string;
    };
}

export const RUST: LanguageDefinition = {
    id: "rust",
    grammar: {
        packageName: "tree-sitter-rust",
        wasmFile: "tree-sitter-rust.wasm",
    },
};
