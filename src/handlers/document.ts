import { promises as fs } from 'fs';
import { join } from 'path';
import type { ToolRunner } from '../infra/exec.js';
import { withTempDir } from '../infra/temp.js';
import { logger } from '../logger.js';
import type { StageParams } from '../operations/types.js';
import { listParam, numberParam, requireString, stringParam } from '../pipeline/params.js';
import type { HandlerTable, MediaContext } from '../pipeline/types.js';

export interface DocumentTools {
  soffice: string;
  pdftoppm: string;
  pdftotext: string;
  pdfinfo: string;
}

export interface DocumentHandlerDeps {
  runTool: ToolRunner;
  tools: DocumentTools;
}

const PAGE_SEPARATOR = '\f';

export const parsePageCount = (pdfinfoOutput: string): number => {
  const match = /^Pages:\s+(\d+)/m.exec(pdfinfoOutput);
  if (!match) throw new Error('Could not read the page count of the converted document');
  return Number(match[1]);
};

/** Requested pages that exist, or every page. Empty selections are an error. */
export const selectPages = (requested: readonly number[] | undefined, pageCount: number): number[] => {
  const pages = requested
    ? requested.filter((page) => page <= pageCount)
    : Array.from({ length: pageCount }, (_, index) => index + 1);
  if (requested && pages.length < requested.length) {
    logger.warn({ requested, pageCount }, 'Skipping pages past the end of the document');
  }
  if (pages.length === 0) throw new Error('No valid pages to convert');
  return pages;
};

export const createDocumentHandlers = ({ runTool, tools }: DocumentHandlerDeps): HandlerTable<'document'> => {
  const toPdf = async (inputPath: string, dir: string): Promise<string> => {
    await runTool(tools.soffice, [
      `-env:UserInstallation=file://${join(dir, 'profile')}`,
      '--headless',
      '--convert-to',
      'pdf',
      '--outdir',
      dir,
      inputPath,
    ]);
    return join(dir, 'input.pdf');
  };

  const extractText = async (pdfPath: string, pages: number[]): Promise<Buffer> => {
    const texts: string[] = [];
    for (const page of pages) {
      const { stdout } = await runTool(tools.pdftotext, ['-f', `${page}`, '-l', `${page}`, '-layout', pdfPath, '-']);
      texts.push(stdout);
    }
    return Buffer.from(texts.join(PAGE_SEPARATOR), 'utf8');
  };

  const renderPages = async (pdfPath: string, dir: string, pages: number[], target: 'png' | 'jpg', dpi: number) => {
    const parts: Buffer[] = [];
    for (const page of pages) {
      const prefix = join(dir, `page-${page}`);
      await runTool(tools.pdftoppm, [
        target === 'png' ? '-png' : '-jpeg',
        '-r',
        `${dpi}`,
        '-f',
        `${page}`,
        '-l',
        `${page}`,
        '-singlefile',
        pdfPath,
        prefix,
      ]);
      parts.push(await fs.readFile(`${prefix}.${target}`));
    }
    return parts;
  };

  const convert = async (context: MediaContext, params: StageParams): Promise<MediaContext> =>
    withTempDir('media-document', async (dir) => {
      const target = requireString(params, 'target');
      const source = stringParam(params, 'source') ?? context.metadata.format;

      if (source === target && (target === 'txt' || target === 'pdf')) {
        if (listParam(params, 'pages') !== undefined) {
          throw new Error(`A page selection cannot be applied to a ${target} to ${target} conversion`);
        }
        return { artifact: context.artifact, metadata: { ...context.metadata, format: target } };
      }

      const inputPath = join(dir, `input.${source}`);
      await fs.writeFile(inputPath, context.artifact);
      const pdfPath = source === 'pdf' ? inputPath : await toPdf(inputPath, dir);

      if (target === 'pdf') {
        return { artifact: await fs.readFile(pdfPath), metadata: { format: 'pdf' } };
      }

      const { stdout } = await runTool(tools.pdfinfo, [pdfPath]);
      const pages = selectPages(listParam(params, 'pages'), parsePageCount(stdout));

      if (target === 'txt') {
        return { artifact: await extractText(pdfPath, pages), metadata: { format: 'txt', pages: pages.length } };
      }
      if (target !== 'png' && target !== 'jpg') {
        throw new Error(`Unsupported document target "${target}"`);
      }

      const parts = await renderPages(pdfPath, dir, pages, target, numberParam(params, 'dpi') ?? 150);
      return { artifact: parts[0], parts, metadata: { format: target, pages: parts.length } };
    });

  return { convert };
};
