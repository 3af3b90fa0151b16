/**
 * Release Radar: Delivery
 */

export {
  SlackNotifier,
  buildEventMessage,
  describeEvent,
  formatUtc,
  type MessageFormat,
  type SlackAttachment,
  type SlackBlock,
  type SlackElement,
  type SlackMessage,
  type SlackText,
} from './slack';
