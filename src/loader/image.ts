import { MEMORY_SIZE } from '../constants/memory';
import { LoadError } from '../errors';

/** A parsed `.obj` image: the load address and the words placed from there. */
export interface ObjectImage {
  origin: number;
  words: Uint16Array;
}

/**
 * Parses an object image: big-endian 16-bit words, the first of which is the
 * origin. Throws {@link LoadError} on a malformed image.
 */
export function parseImage(image: Uint8Array): ObjectImage {
  if (image.length === 0) {
    throw new LoadError('EMPTY_IMAGE', 'Object image is empty');
  }
  if (image.length % 2 !== 0) {
    throw new LoadError(
      'ODD_LENGTH',
      `Object image must hold whole 16-bit words, but is ${image.length} bytes long`,
      { length: image.length }
    );
  }
  if (image.length === 2) {
    throw new LoadError('NO_PROGRAM_WORDS', 'Object image has an origin but no program words');
  }

  const view = new DataView(image.buffer, image.byteOffset, image.byteLength);
  /* the origin tells us where in memory to place the image */
  const origin = view.getUint16(0);
  const words = new Uint16Array(image.length / 2 - 1);
  for (let pos = 0; pos < words.length; pos++) {
    words[pos] = view.getUint16((pos + 1) * 2);
  }

  if (origin + words.length > MEMORY_SIZE) {
    throw new LoadError(
      'IMAGE_TOO_LONG',
      `Object image of ${words.length} words does not fit in memory from origin ${origin}`,
      { origin, words: words.length }
    );
  }
  return { origin, words };
}
