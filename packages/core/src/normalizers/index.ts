import type { ProviderKind } from "@threadwatch/contracts";
import { ClaudeNormalizer } from "./claude.js";
import { CodexNormalizer } from "./codex.js";
import type { NormalizeContext, NormalizedRecord, RecordNormalizer } from "./types.js";

export class NormalizerRegistry {
  private readonly normalizers = new Map<ProviderKind, RecordNormalizer>();

  constructor(normalizers?: RecordNormalizer[]) {
    for (const normalizer of normalizers ?? [new CodexNormalizer(), new ClaudeNormalizer()]) {
      this.normalizers.set(normalizer.provider, normalizer);
    }
  }

  normalize(context: NormalizeContext, raw: Record<string, unknown>): NormalizedRecord | null {
    const normalizer = this.normalizers.get(context.provider);
    return normalizer ? normalizer.normalize(context, raw) : null;
  }
}

export { ClaudeNormalizer } from "./claude.js";
export { CodexNormalizer, isRestatedEvent } from "./codex.js";
export * from "./common.js";
export type * from "./types.js";
