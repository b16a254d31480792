export {
  LayoutError,
  LayoutErrorCode,
  ConfigurationError,
  MetricsUnavailableError,
  ContentError
} from './LayoutError';
