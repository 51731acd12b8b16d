/**
 * @fileoverview Interface exports.
 *
 * @module interfaces
 */

export type { IConfigProvider } from './IConfigProvider';
export type { IDiagnosticStore } from './IDiagnosticStore';
export type { IFileSystem } from './IFileSystem';
export type { IJobNotifier, NotifiableJob } from './IJobNotifier';
export type { IJobStore } from './IJobStore';
export type { ILogger, LogLevel } from './ILogger';
export type {
  IWebhookNotifier,
  WebhookRequest,
  WebhookResult,
  WebhookTransport,
} from './IWebhookNotifier';
