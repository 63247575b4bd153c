export * from './types/index.js';
export { Selector, css, xpath, text, normalizeDescriptor } from './selectors/selector.js';
export { SelectorGroup } from './selectors/selector-group.js';
export * from './selectors/errors.js';
export { parseSelectorGroups, loadSelectorGroups } from './selectors/loader.js';
export type { SelectorGroupCatalogue } from './selectors/loader.js';
export {
  createPlaywrightResolver,
  toLocator,
  DEFAULT_RESOLVE_TIMEOUT_MS,
} from './engines/playwright-resolver.js';
export type {
  PlaywrightPage,
  PlaywrightLocator,
  PlaywrightResolverOptions,
} from './engines/playwright-resolver.js';
export { classifyResolutionError, describeError } from './exception/classifier.js';
export { ResolutionLogger } from './logging/resolution-logger.js';
export { ResolutionMetricsCollector } from './metrics/collector.js';
export type { ResolutionMetrics, GroupMetrics } from './metrics/collector.js';
export * from './schemas/index.js';
