import { ExecutionError } from '../errors.js';
import type { FfmpegRunner } from '../infra/ffmpeg.js';
import { extensionOf, type MediaType } from '../media/catalog.js';
import type { MediaContext } from '../pipeline/types.js';

/** Stage index reported when the source itself cannot be read. */
const SOURCE_STAGE = -1;

/**
 * Build the initial pipeline context for a fetched source. Documents are not
 * probed; their format comes from the key extension alone.
 */
export const inspectSource = async (
  ffmpeg: FfmpegRunner,
  mediaType: MediaType,
  key: string,
  artifact: Buffer,
): Promise<MediaContext> => {
  const format = extensionOf(key) ?? '';
  if (mediaType === 'document') {
    return { artifact, metadata: { format } };
  }

  try {
    const probe = await ffmpeg.probe(artifact, format || 'bin');
    return { artifact, metadata: { ...probe, format } };
  } catch (err) {
    throw new ExecutionError(SOURCE_STAGE, 'probe', err);
  }
};
