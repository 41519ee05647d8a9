export { globMatch, isWildcard, matchesAnyPattern } from './tool-policy.js';
export { PolicyEnforcer, DENY_REASONS, type AuthorizationDecision } from './enforcer.js';
