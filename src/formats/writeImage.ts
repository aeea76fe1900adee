import type { EmittedImage, ImageArtifact, SymbolEntry, WriteImageOptions } from './types.js';

/**
 * Create the image artifact: every word in address order, comma-separated, no header.
 */
export function writeImage(
  image: EmittedImage,
  _symbols: SymbolEntry[],
  opts?: WriteImageOptions,
): ImageArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  return { kind: 'image', text: image.words.join(',') + lineEnding };
}
