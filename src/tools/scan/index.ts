/**
 * Scan Image Tool
 */

export { scanImages, scanOutputFileName } from './tool';
export type { ImageScanner, ScanImagesParams, ScanImagesDeps } from './tool';
