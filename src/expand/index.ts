/**
 * Macro expansion engine
 *
 * @module expand
 */

export { Expander, type ExpanderOptions, type BodyCache } from './engine.js';
export {
  ExpansionContext,
  DEFAULT_LIMITS,
  type CallFrame,
  type CallKind,
  type EnterResult,
  type ExpansionLimits,
} from './context.js';
export { TemplateFrame, type NodeExpander } from './frame.js';
export {
  PARSER_FUNCTIONS,
  errorMarker,
  magicWord,
  parserFunction,
  textArg,
  valuesEqual,
  type FunctionArg,
  type FunctionCall,
  type FunctionHost,
  type ParserFunction,
} from './parser-functions.js';
export { evaluate, formatExprResult, ExprError } from './expr.js';
export { transclusionText, pageView, pageViewText, type PageView } from './preprocess.js';
