export type { AgentProfile, OutputSchema } from './types.js';
export { BASE_RESULT_KEYS } from './types.js';
export {
  AgentProfileStore,
  buildProfileStore,
  loadProfileStore,
  type AgentProfileDefinition,
} from './store.js';
