export {
  ReplayExecutor,
  StaticToolProvider,
  replayScriptSchema,
  type ReplayScript,
  type ReplayScriptInput,
} from './replay.js';
export { parseReplayBatch, loadReplayBatch, type ReplayBatch } from './replay-file.js';
