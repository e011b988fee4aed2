export {
  CommentExtractor,
  createCommentExtractor,
  extractComments,
  extractCommentMatches,
} from "./extractor.js";
export { LineIndex } from "./line-index.js";
export type { CommentMatch, ExtractFileOptions, FileExtraction } from "./types.js";
