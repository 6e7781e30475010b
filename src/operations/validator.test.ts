import { describe, it, expect } from 'vitest';
import { buildPipeline } from './index.js';
import { ValidationError } from '../errors.js';
import { SCHEMAS } from './schema/index.js';
import { SAMPLE_RATES } from './schema/audio.js';

const b64 = (text: string) => Buffer.from(text).toString('base64url');

const validationFailure = (fn: () => unknown): ValidationError => {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
};

describe('validatePipeline', () => {
  describe('typing and defaults', () => {
    it('should coerce values and fill defaults for resize', () => {
      const pipeline = buildPipeline('image', 'resize,w_800');

      expect(pipeline.stages[0].params).toEqual({ w: 800, m: 'lfit', limit: true });
    });

    it('should fill a conditional default only when its condition holds', () => {
      const pad = buildPipeline('image', 'resize,w_100,h_100,m_pad');
      const percent = buildPipeline('image', 'resize,p_50');

      expect(pad.stages[0].params.color).toBe('FFFFFF');
      expect(percent.stages[0].params).toEqual({ p: 50, limit: true });
    });

    it('should decode base64url text', () => {
      const pipeline = buildPipeline('image', `watermark,text_${b64('Hello')}`);

      expect(pipeline.stages[0].params.text).toBe('Hello');
      expect(pipeline.stages[0].params.g).toBe('se');
    });

    it('should expand a page list', () => {
      const pipeline = buildPipeline('document', `convert,target_png,pages_${b64('1,2,4-6')}`);

      expect(pipeline.stages[0].params).toEqual({ target: 'png', pages: [1, 2, 4, 5, 6], dpi: 150 });
    });

    it('should accept a single page or range written plainly', () => {
      expect(buildPipeline('document', 'convert,target_png,pages_3').stages[0].params.pages).toEqual([3]);
      expect(buildPipeline('document', 'convert,target_txt,pages_2-4').stages[0].params.pages).toEqual([2, 3, 4]);
    });

    it('should fill snapshot defaults and report the output format', () => {
      const pipeline = buildPipeline('video', 'snapshot');

      expect(pipeline.stages[0].params).toEqual({ t: 0, w: 0, h: 0, m: 'default', f: 'jpg', ar: 'auto' });
      expect(pipeline.outputFormat).toBe('jpg');
    });

    it('should reject an out-of-range value', () => {
      const err = validationFailure(() => buildPipeline('image', 'blur,r_51'));

      expect(err.key).toBe('r');
      expect(err.reason).toBe('must be between 1 and 50');
    });

    it('should reject a non-hex color', () => {
      const err = validationFailure(() => buildPipeline('image', 'watermark,text_SGk,color_GGGGGG'));

      expect(err.key).toBe('color');
    });

    it('should reject unknown keys', () => {
      const err = validationFailure(() => buildPipeline('image', 'resize,w_10,z_1'));

      expect(err.operation).toBe('resize');
      expect(err.key).toBe('z');
      expect(err.reason).toBe('unknown parameter');
    });

    it('should freeze the pipeline', () => {
      const pipeline = buildPipeline('image', 'resize,w_800/grayscale');

      expect(Object.isFrozen(pipeline)).toBe(true);
      expect(Object.isFrozen(pipeline.stages)).toBe(true);
      expect(Object.isFrozen(pipeline.stages[0].params)).toBe(true);
    });
  });

  describe('positional values', () => {
    it('should bind a bare value to the positional key', () => {
      expect(buildPipeline('image', 'rotate,180').stages[0].params).toEqual({ d: 180 });
    });

    it('should reject a bare value outside the allowed set', () => {
      const err = validationFailure(() => buildPipeline('image', 'rotate,45'));

      expect(err.key).toBe('d');
      expect(err.reason).toBe('must be one of 90, 180, 270');
    });

    it('should reject a bare value given alongside the explicit key', () => {
      expect(validationFailure(() => buildPipeline('image', 'rotate,90,d_90')).key).toBe('d');
    });

    it('should reject bare values on operations without a positional key', () => {
      const err = validationFailure(() => buildPipeline('image', 'grayscale,1'));

      expect(err.key).toBeUndefined();
    });

    it('should reject more than one bare value', () => {
      expect(() => buildPipeline('image', 'blur,3,4')).toThrow(ValidationError);
    });
  });

  describe('exclusivity', () => {
    it('should reject aq together with ab', () => {
      const err = validationFailure(() => buildPipeline('audio', 'convert,f_mp3,aq_90,ab_96000'));

      expect(err.key).toBe('ab');
      expect(err.reason).toBe('cannot be combined with "aq"');
    });

    it('should reject the combination even when the values are invalid', () => {
      const err = validationFailure(() => buildPipeline('audio', 'convert,f_mp3,aq_999,ab_x'));

      expect(err.reason).toBe('cannot be combined with "aq"');
    });

    it('should allow keys sharing a member', () => {
      expect(buildPipeline('image', 'crop,w_10,h_20').stages[0].params).toEqual({ w: 10, h: 20, x: 0, y: 0, g: 'nw' });
    });

    it('should reject percent resize with a box', () => {
      expect(validationFailure(() => buildPipeline('image', 'resize,p_50,w_10')).key).toBe('w');
    });
  });

  describe('conditional applicability', () => {
    it('should reject color without pad mode', () => {
      const err = validationFailure(() => buildPipeline('image', 'resize,w_100,color_FF0000'));

      expect(err.key).toBe('color');
      expect(err.reason).toBe('only applies when m is one of pad');
    });

    it('should reject adepth outside flac', () => {
      expect(validationFailure(() => buildPipeline('audio', 'convert,f_mp3,adepth_24')).key).toBe('adepth');
      expect(buildPipeline('audio', 'convert,f_flac,adepth_24').stages[0].params.adepth).toBe(24);
    });

    it('should reject abopt without ab', () => {
      const err = validationFailure(() => buildPipeline('audio', 'convert,f_mp3,abopt_1'));

      expect(err.reason).toBe('only applies when ab is given');
    });

    it('should reject quality on a lossless format selection', () => {
      expect(validationFailure(() => buildPipeline('image', 'format,f_png,q_80')).key).toBe('q');
    });

    it('should require both sides for fill-like modes', () => {
      const err = validationFailure(() => buildPipeline('image', 'resize,w_100,m_pad'));

      expect(err.key).toBe('h');
      expect(err.reason).toBe('is required when m is one of fill, pad, fixed');
    });

    it('should reject page selection for pdf targets', () => {
      expect(validationFailure(() => buildPipeline('document', `convert,target_pdf,pages_${b64('1')}`)).key).toBe(
        'pages',
      );
    });
  });

  describe('required keys', () => {
    it('should require the format of a format stage', () => {
      expect(validationFailure(() => buildPipeline('image', 'format')).key).toBe('f');
    });

    it('should require one of the scale keys', () => {
      const err = validationFailure(() => buildPipeline('image', 'resize,limit_0'));

      expect(err.key).toBeUndefined();
      expect(err.reason).toBe('requires one of p, w, h, l, s');
    });
  });

  describe('terminal operations', () => {
    it('should reject a stage after snapshot', () => {
      const err = validationFailure(() => buildPipeline('video', 'snapshot,t_1000/snapshot'));

      expect(err.position).toBe(1);
      expect(err.reason).toBe('cannot follow terminal operation "snapshot"');
    });
  });

  describe('format constraints', () => {
    it('should reject a sample rate AMR does not allow', () => {
      const err = validationFailure(() => buildPipeline('audio', 'convert,f_amr,ar_44100,ac_2'));

      expect(err.key).toBe('ar');
      expect(err.reason).toBe('must be one of 8000 for amr output');
    });

    it('should fill the only value AMR allows', () => {
      const pipeline = buildPipeline('audio', 'convert,f_amr');

      expect(pipeline.stages[0].params).toEqual({ f: 'amr', ar: 8000, ac: 1 });
    });

    it('should accept every sample rate and channel count the table allows', () => {
      for (const [format, bounds] of Object.entries(SCHEMAS.audio.formats)) {
        const rates = bounds.ar?.allowed ?? SAMPLE_RATES;
        const channels = bounds.ac?.allowed ?? Array.from({ length: bounds.ac?.max ?? 8 }, (_, i) => i + 1);
        for (const ar of rates) {
          for (const ac of channels) {
            expect(() => buildPipeline('audio', `convert,f_${format},ar_${ar},ac_${ac}`)).not.toThrow();
          }
        }
      }
    });

    it('should reject values the table excludes', () => {
      expect(validationFailure(() => buildPipeline('audio', 'convert,f_opus,ar_44100')).key).toBe('ar');
      expect(validationFailure(() => buildPipeline('audio', 'convert,f_ac3,ac_8')).key).toBe('ac');
      expect(validationFailure(() => buildPipeline('audio', 'convert,f_flac,ab_96000')).reason).toBe(
        'is not supported for flac output',
      );
    });

    it('should track the format selected by an earlier stage', () => {
      const err = validationFailure(() => buildPipeline('image', 'format,png/quality,q_50'));

      expect(err.position).toBe(1);
      expect(err.key).toBe('q');
      expect(() => buildPipeline('image', 'format,jpg/quality,q_50')).not.toThrow();
    });

    it('should start from the source format', () => {
      expect(() => buildPipeline('image', 'quality,Q_80', { sourceFormat: 'PNG' })).toThrow(ValidationError);
      expect(buildPipeline('image', 'quality,Q_80', { sourceFormat: 'jpg' }).outputFormat).toBe('jpg');
    });

    it('should cap dpi for jpg document pages', () => {
      expect(validationFailure(() => buildPipeline('document', 'convert,target_jpg,dpi_400')).key).toBe('dpi');
      expect(buildPipeline('document', 'convert,target_png,dpi_400').stages[0].params.dpi).toBe(400);
    });
  });
});
