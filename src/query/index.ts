export { Query } from "./query.js";
export type {
  CaptureOffset,
  MatchPredicate,
  PredicateArgument,
  PredicateFactory,
  Properties,
  PropertySetting,
  QueryCapture,
  QueryCursorOptions,
  QueryMatch,
  QueryOptions,
  QueryPredicate,
  TextProvider,
} from "./types.js";
