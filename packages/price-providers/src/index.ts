export { CacheMissError, DataNotFoundError, ProviderError, RequestError } from './core/errors.js';
export type {
  HistoricalExchangeRateProvider,
  LiveExchangeRateProvider,
  SecurityDataSource,
  SecurityInfo,
  SecurityInfoProvider,
  ShareSplit,
} from './core/types.js';
export { CachingSecurityInfoProvider } from './providers/caching/provider.js';
export { LocalHistoricalExchangeRateProvider } from './providers/local/provider.js';
export { RATE_FILE_FIELDS } from './providers/local/local-utils.js';
export { ManualExchangeRateProvider, type ManualRateEntry } from './providers/manual/provider.js';
export { SecurityRecordSchema, StaticSecurityInfoProvider, type SecurityRecord } from './providers/static/provider.js';
export { FinancialData, type FinancialDataProviders } from './services/financial-data.js';
