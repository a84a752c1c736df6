export {
  Preprocessor,
  preprocessFiles,
  type PreprocessorState,
  type ProcessSummary,
} from "./driver.js";

export {
  LineSplitter,
  splitLines,
  textLines,
  readSourceLines,
  STDIN_SOURCE,
  type SourceLine,
} from "./line-reader.js";
