// Node 20 ships no Symbol.metadata, and both the tsc and esbuild decorator helpers
// only create `context.metadata` when it exists. esbuild falls back to this registered symbol.
if (!("metadata" in Symbol)) {
  Object.defineProperty(Symbol, "metadata", { value: Symbol.for("Symbol.metadata") });
}

export {};
