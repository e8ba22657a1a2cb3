import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';

import { describeError, fail, ok, type Result } from '../../errors';
import { logger } from '../../logger';
import { PDF_CONTENT_TYPE } from '../storage/objectStore';
import { runCommand, type CommandOutcome } from './runCommand';
import { withScopedDirectory } from './scopedDirectory';

export interface DocumentConverter {
  readonly extension: string;
  readonly contentType: string;
  convert(document: Buffer): Promise<Result<Buffer>>;
}

interface FormatConverterOptions {
  executable: string;
  timeoutMs: number;
  tempRoot?: string;
}

const INPUT_NAME = 'document';

export function buildConversionArgs(workDir: string, inputPath: string): string[] {
  return [
    '--headless',
    '--invisible',
    '--nologo',
    '--nodefault',
    '--norestore',
    '--nolockcheck',
    `-env:UserInstallation=${pathToFileURL(path.join(workDir, 'profile')).href}`,
    '--convert-to',
    'pdf',
    '--outdir',
    workDir,
    inputPath,
  ];
}

/**
 * Converts .docx to PDF with a headless LibreOffice. Every call runs with its own profile
 * and output directory, so concurrent conversions never share lock files.
 */
export class FormatConverter implements DocumentConverter {
  readonly extension = '.pdf';
  readonly contentType = PDF_CONTENT_TYPE;

  constructor(private readonly options: FormatConverterOptions) {}

  async convert(document: Buffer): Promise<Result<Buffer>> {
    try {
      return await withScopedDirectory(
        'certgen-convert-',
        (workDir) => this.convertIn(workDir, document),
        this.options.tempRoot
      );
    } catch (error) {
      logger.error(`[Convert] Conversion workspace failed: ${describeError(error)}`);
      return fail('ConversionProcessError', `Conversion workspace failed: ${describeError(error)}`, error);
    }
  }

  private async convertIn(workDir: string, document: Buffer): Promise<Result<Buffer>> {
    const inputPath = path.join(workDir, `${INPUT_NAME}.docx`);
    const outputPath = path.join(workDir, `${INPUT_NAME}.pdf`);
    await writeFile(inputPath, document);

    const { executable, timeoutMs } = this.options;
    let outcome: CommandOutcome;
    try {
      outcome = await runCommand(executable, buildConversionArgs(workDir, inputPath), {
        timeoutMs,
        cwd: workDir,
      });
    } catch (error) {
      logger.error(`[Convert] Could not start ${executable}: ${describeError(error)}`);
      return fail('ConversionProcessError', `Could not start ${executable}: ${describeError(error)}`, error);
    }

    if (outcome.timedOut) {
      logger.error(`[Convert] ${executable} timed out after ${timeoutMs}ms`);
      return fail('ConversionProcessError', `${executable} timed out after ${timeoutMs}ms`);
    }
    if (outcome.code !== 0) {
      const reason = outcome.code === null ? `signal ${outcome.signal ?? 'unknown'}` : `code ${outcome.code}`;
      const detail = outcome.stderr ? `: ${outcome.stderr}` : '';
      logger.error(`[Convert] ${executable} exited with ${reason}${detail}`);
      return fail('ConversionProcessError', `${executable} exited with ${reason}${detail}`);
    }

    try {
      const converted = await readFile(outputPath);
      logger.info(`[Convert] Converted document to PDF (${converted.length} bytes)`);
      return ok(converted);
    } catch (error) {
      logger.error(`[Convert] ${executable} exited cleanly but wrote no PDF`);
      return fail('ConversionOutputMissing', `${executable} produced no output file`, error);
    }
  }
}
