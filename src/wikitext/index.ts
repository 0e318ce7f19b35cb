export { parse, parseNodes, applyFormatting } from './parser.js'
export { toWikitext, toText, cleanText } from './render.js'
export {
  walk,
  findAll,
  mapNodes,
  childNodes,
  isKind,
  templateName,
  templateArgs,
  argText,
  normalizeTemplateName,
} from './utils.js'
export type { NodeOfKind, TemplateArgs } from './utils.js'
export { LITERAL_OPEN, LITERAL_CLOSE, RAW_TAGS } from './constants.js'
export type * from './types.js'
