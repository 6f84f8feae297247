export { pickParserFor, extensionOf, acceptedExtensions } from './registry'
export { loadFiles } from './loadFiles'
export type { Parser, ParseResult } from './parsers/BaseParser'
