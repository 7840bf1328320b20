export {
  type MergedWalk,
  mergeWalk,
  walk,
  type WalkBatcher,
  type WalkOptions,
  type WalkPostOptions,
  type WalkResult,
} from './walker.js';
