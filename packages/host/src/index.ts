/**
 * @edit-assist/host
 *
 * Host application backed by a JSON project document.
 */

export {
  DocumentApplication,
  DocumentProject,
  DocumentMediaPool,
  DocumentFolder,
  DocumentMediaItem,
  DocumentTimeline,
  DocumentTimelineItem,
} from './documentHost.js';

export {
  createDocumentHost,
  openProjectDocument,
  saveProjectDocument,
} from './loader.js';

export {
  projectDocumentSchema,
  binSchema,
  mediaClipSchema,
  timelineSchema,
  trackSchema,
  timelineItemSchema,
  type ProjectDocument,
  type ProjectDocumentInput,
  type BinDocument,
  type MediaClipDocument,
  type TimelineDocument,
  type TrackDocument,
  type TimelineItemDocument,
} from './schema.js';
