/**
 * Daily digest and notifications
 *
 * @module report
 */

export {
  buildDailyDigest,
  digestFileName,
  loadDayEntries,
  renderDigest,
  writeDailyDigest,
  type DailyDigest,
  type DigestRun,
  type DigestTypeTotals,
  type WrittenDigest,
} from './daily-digest.js';
export {
  CompositeNotificationSink,
  createNotificationSink,
  slackBody,
  type NotificationPayload,
  type NotificationResult,
  type NotificationSink,
  type NotificationSinkOptions,
} from './notification-sink.js';
