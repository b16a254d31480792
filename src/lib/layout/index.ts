export { PageCursor } from './PageCursor';
export type { PageSource, CursorPosition, CursorSnapshot, FlowResult } from './PageCursor';
export { isDegenerateRegion, bodyRegion, regionWidth, regionHeight } from './FlowRegion';
