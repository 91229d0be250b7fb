/**
 * Resolve Targets Tool
 */

export { resolveTargets, parseSelection, type ResolveTargetsOptions } from './tool';
