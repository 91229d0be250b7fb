/**
 * Build Image Tool
 */

export { buildImages, imageRefFor, buildArgsFor } from './tool';
export type { BuildImagesParams, BuildImagesDeps } from './tool';
