export { highlightTokens } from "./highlight.js";
export type { HighlightOptions, HighlightResult, HighlightToken } from "./highlight.js";
export { RangesQuery } from "./ranges.js";
export type { FoldRange, MatchedRange, RangesOptions } from "./ranges.js";
export { InjectionQuery } from "./injections.js";
export type {
  ByteRange,
  Injection,
  InjectionCollectOptions,
  InjectionLanguage,
} from "./injections.js";
