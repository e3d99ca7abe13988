export { SyntaxDocument, buildEdit } from "./syntax-document.js";
export type { DocumentHighlights, SyntaxDocumentOptions, TextRange } from "./syntax-document.js";
