/**
 * Table module: multi-page assembly and majority column voting.
 */

export { assembleTables, collectSegments, voteColumnCount, alignRows, padRow } from './assemble.js';
export type { AssemblyResult, SegmentCollection } from './assemble.js';
export type { PageContent, TableSegment, ColumnVote } from './types.js';
