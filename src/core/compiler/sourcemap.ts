// src/core/compiler/sourcemap.ts
// English line -> Core IL statement -> generated target line.

import type { SourceMapping } from "../ast";

/** top-level statement index -> first generated line (1-based) */
export type LineMap = Record<number, number>;

/** english line -> sorted, de-duplicated generated lines */
export type ComposedSourceMap = Record<string, number[]>;

/**
 * Chains the document's `source_map` with an emitter's line map. English
 * lines whose statements produced no target lines are dropped.
 */
export function composeSourceMaps(englishToCoreil: SourceMapping, coreilToTarget: LineMap): ComposedSourceMap {
  const out: ComposedSourceMap = {};
  for (const [line, indices] of Object.entries(englishToCoreil)) {
    const targets = new Set<number>();
    for (const i of indices) {
      const t = coreilToTarget[i];
      if (t !== undefined) targets.add(t);
    }
    if (targets.size > 0) out[line] = [...targets].sort((a, b) => a - b);
  }
  return out;
}
