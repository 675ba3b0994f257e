export {
  ENCODING_MARKER,
  encodeValue,
  decodeValue,
  decodeIfEncoded,
  isEncodedValue,
  toStorageParam,
  prepareForStorage,
  restoreFromStorage,
} from './value-codec.js';
