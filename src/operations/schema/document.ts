import type { NamespaceSchema } from './types.js';
import { base64Text, int, oneOf, pageList } from './builders.js';

export const DOCUMENT_TARGETS = ['pdf', 'png', 'jpg', 'txt'] as const;

export const DOCUMENT_SOURCES = [
  'pdf',
  'doc',
  'docx',
  'odt',
  'rtf',
  'txt',
  'xls',
  'xlsx',
  'ods',
  'csv',
  'ppt',
  'pptx',
  'odp',
] as const;

const IMAGE_TARGETS = ['png', 'jpg'] as const;

export const DOCUMENT_SCHEMA: NamespaceSchema<'document'> = {
  operations: {
    convert: {
      params: {
        target: { type: oneOf(...DOCUMENT_TARGETS), required: true },
        source: { type: oneOf(...DOCUMENT_SOURCES) },
        pages: { type: pageList, when: { whenParam: 'target', in: [...IMAGE_TARGETS, 'txt'] } },
        // Bucket names top out at 222 characters.
        b: { type: base64Text(222) },
        dpi: { type: int(72, 600), default: 150, when: { whenParam: 'target', in: IMAGE_TARGETS } },
      },
      formatKey: 'target',
      terminal: true,
    },
  },
  formats: {
    jpg: { dpi: { max: 300 } },
  },
};
