export { SpellbookDocument } from './SpellbookDocument';
export type { PageAddedEvent } from './SpellbookDocument';
export { SpellbookWriter, DEFAULT_SPELLBOOK_TITLE, TITLE_PAGE_BOOKMARK, descriptionMarkup } from './SpellbookWriter';
export { createSpellbook } from './createSpellbook';
export type { SpellbookOptions } from './createSpellbook';
