import { fileURLToPath } from 'url';
import type { DefinitionsConfig } from './config.js';

// src/config and dist/config sit at the same depth below the package root
const BUNDLED_DIR = new URL('../../config/', import.meta.url);

export const BUNDLED_TOOLS_PATH = fileURLToPath(new URL('tools.json', BUNDLED_DIR));
export const BUNDLED_PROFILES_PATH = fileURLToPath(new URL('profiles.json', BUNDLED_DIR));

export function resolveDefinitionPaths(config: DefinitionsConfig): { toolsPath: string; profilesPath: string } {
  return {
    toolsPath: config.toolsPath || BUNDLED_TOOLS_PATH,
    profilesPath: config.profilesPath || BUNDLED_PROFILES_PATH,
  };
}
