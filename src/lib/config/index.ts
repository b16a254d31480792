export { validateLayoutConfig, PAGE_SIZES } from './LayoutConfig';
export type { LayoutConfig } from './LayoutConfig';
export { DEFAULT_LAYOUT_CONFIG } from './defaults';
export { createLayoutConfig, loadLayoutConfig, mergeWithDefaults } from './loadConfig';
export {
  layoutConfigSchema,
  colorSchema,
  fontStyleSchema
} from './schema';
export type {
  LayoutConfigInput,
  LayoutConfigOverrides,
  PageNumberOptions,
  TableOptions,
  TextClassOptions,
  SpacingOptions,
  FontOptions
} from './schema';
