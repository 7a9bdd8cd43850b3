/**
 * Price Drop Watch
 *
 * Scheduled price checks for tracked products: budgeted search and extraction,
 * change detection with deduplication, and idempotent alert delivery.
 */

export * from './types.js';
export * from './errors.js';
export * from './config.js';
export * from './utils/http.js';
export * from './utils/price.js';
export * from './utils/query.js';
export * from './store/state-store.js';
export * from './cost/tracker.js';
export * from './providers/types.js';
export { TavilyExtractProvider, TavilySearchProvider } from './providers/tavily/index.js';
export { OpenAIExtractionProvider } from './providers/openai/index.js';
export { HttpPageReader, parseProductPage } from './providers/page/index.js';
export { PriceExtractor, assessConfidence } from './extractor/index.js';
export { ChangeDetector } from './detector/index.js';
export { notificationIdFor } from './detector/notification-id.js';
export { NotificationDispatcher } from './notifications/dispatcher.js';
export { EmailChannel } from './notifications/channels/email.js';
export { SmsChannel } from './notifications/channels/sms.js';
export type { ChannelSender } from './notifications/channels/types.js';
export { buildAlertMessage } from './notifications/message.js';
export { runPriceCheck, processProduct } from './orchestrator/index.js';
export { runOnce } from './run.js';
