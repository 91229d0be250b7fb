/**
 * Push Image Tool
 */

export {
  publishImages,
  type PublishedImage,
  type PublishImagesParams,
  type PublishImagesDeps,
} from './tool';
