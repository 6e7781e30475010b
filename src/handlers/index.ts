import type { ToolRunner } from '../infra/exec.js';
import type { FfmpegRunner } from '../infra/ffmpeg.js';
import type { HandlerRegistry } from '../pipeline/types.js';
import { createAudioHandlers } from './audio.js';
import { createDocumentHandlers, type DocumentTools } from './document.js';
import { createImageHandlers } from './image.js';
import { createVideoHandlers } from './video.js';

export interface HandlerDeps {
  ffmpeg: FfmpegRunner;
  runTool: ToolRunner;
  documentTools: DocumentTools;
  watermarkFontFile?: string;
}

export const createHandlers = (deps: HandlerDeps): HandlerRegistry => ({
  image: createImageHandlers({ ffmpeg: deps.ffmpeg, fontFile: deps.watermarkFontFile }),
  audio: createAudioHandlers({ ffmpeg: deps.ffmpeg }),
  video: createVideoHandlers({ ffmpeg: deps.ffmpeg }),
  document: createDocumentHandlers({ runTool: deps.runTool, tools: deps.documentTools }),
});
