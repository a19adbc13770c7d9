export {
  endsWithHyphen,
  endsWithSentenceTerminal,
  joinFragments,
  mergeFragments,
  remapRegionDivision,
  mergeDocument,
} from './fragment-merger.js';

export type { MergeResult } from './fragment-merger.js';
