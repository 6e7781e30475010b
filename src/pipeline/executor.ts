import { createHash } from 'crypto';
import { ExecutionError } from '../errors.js';
import { logger } from '../logger.js';
import type { MediaType } from '../media/catalog.js';
import type { Pipeline } from '../operations/types.js';
import { contentTypeFor } from './content-type.js';
import type { HandlerTable, MediaContext, PipelineResult } from './types.js';

export const finalizeArtifact = (context: MediaContext): PipelineResult => ({
  ...context,
  etag: createHash('md5').update(context.artifact).digest('hex'),
  contentType: contentTypeFor(context.metadata.format),
});

/**
 * Run the stages in order, each receiving the previous stage's output.
 * A failing handler aborts the run; the error names the stage that failed.
 */
export const executePipeline = async <M extends MediaType>(
  pipeline: Pipeline<M>,
  source: MediaContext,
  handlers: HandlerTable<M>,
): Promise<PipelineResult> => {
  let context = source;

  for (const [index, stage] of pipeline.stages.entries()) {
    const handler = handlers[stage.name];
    const startedAt = Date.now();
    try {
      context = await handler(context, stage.params);
    } catch (err) {
      logger.warn({ err, stage: index, operation: stage.name }, 'Pipeline stage failed');
      throw new ExecutionError(index, stage.name, err);
    }
    logger.debug(
      { stage: index, operation: stage.name, format: context.metadata.format, ms: Date.now() - startedAt },
      'Pipeline stage finished',
    );
  }

  return finalizeArtifact(context);
};
