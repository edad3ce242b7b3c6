export {
  sendNotification,
  notificationCommand,
  urgencyFor,
  DEFAULT_TITLE,
} from './desktop.js';
export type { NotifyOptions } from './desktop.js';
