/**
 * @module observability/index
 * @description Event sinks for discard and rejection decisions
 * @status COMPLETE
 * @lastModified 2026-10-14
 */

export {
  type ConsoleSinkOptions,
  NULL_SINK,
  CollectingSink,
  EventRecorder,
  createConsoleSink,
  fanOutSink,
  formatEvent,
  preview,
} from './sinks';
