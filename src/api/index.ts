export { handleSnapshots } from './snapshots';
export { handleTranscripts } from './transcripts';
export { handleTemplates } from './templates';
export { handleFields } from './fields';
export type { ApiContext, ApiResponse } from './http';
