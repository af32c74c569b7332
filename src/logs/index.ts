/**
 * ABOUTME: Public exports for the taskloop event log.
 */

export {
  TRACKER_EVENTS_FILE,
  appendTrackerEvent,
  readTrackerEvents,
  type TrackerLogEvent,
} from './tracker-events.js';
