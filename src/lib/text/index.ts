export { FontMetrics, MM_PER_POINT } from './FontMetrics';
export type { FontMetricsSource } from './FontMetrics';
export { LineWrapper, splitTokens, resolveEscape, ESCAPE_CHAR } from './LineWrapper';
export type { WrapOptions } from './LineWrapper';
export { TextFlow, BULLET_TOKENS, BULLET_GLYPH } from './TextFlow';
export type { FlowOptions } from './TextFlow';
export { STYLE_TAGS, TABLE_TAG, classifyToken, tokenizeMarkup, tokenText } from './MarkupTokenizer';
export type { MarkupToken } from './MarkupTokenizer';
export { MarkupWriter } from './MarkupWriter';
export type { MarkupOptions } from './MarkupWriter';
