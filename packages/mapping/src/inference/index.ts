export { inferStorageType, inferFieldKind, textLength } from './type-inferencer.js';
export { IMAGE_EXTENSIONS, isImageLocator, isImageRecord, isImageArray } from './media-detector.js';
