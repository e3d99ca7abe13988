/**
 * Session Module
 *
 * One open document with a language registry, as served by the tool server.
 */

export {
  SyntaxSession,
  type CaptureSummary,
  type DocumentStats,
  type HighlightSpan,
  type MatchSummary,
  type QueryResult,
  type SessionInfo,
  type SyntaxSessionOptions,
} from "./syntax-session.js";
