import { execFile } from "node:child_process";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import { errorMessage, Logger } from "../../config/logger";

export interface CommandOptions {
  signal?: AbortSignal;
  maxBuffer: number;
}

export type CommandRunner = (
  file: string,
  args: ReadonlyArray<string>,
  options: CommandOptions,
) => Promise<{ stdout: string }>;

export interface OcrOptions {
  pdftoppmPath: string;
  tesseractPath: string;
  dpi: number;
  language: string;
}

export interface OcrText {
  text: string;
  pageCount: number;
}

const execFileAsync = promisify(execFile);
const OCR_MAX_BUFFER = 16 * 1024 * 1024;
const PAGE_PREFIX = "page";

export const runCommand: CommandRunner = async (file, args, options) => {
  const { stdout } = await execFileAsync(file, [...args], {
    signal: options.signal,
    maxBuffer: options.maxBuffer,
    encoding: "utf8",
  });
  return { stdout };
};

export class OcrExtractor {
  constructor(
    private readonly options: OcrOptions,
    private readonly logger: Logger,
    private readonly run: CommandRunner = runCommand,
    private readonly tempRoot: string = tmpdir(),
  ) {}

  async extract(pdf: Buffer, signal?: AbortSignal): Promise<OcrText> {
    const workDir = await mkdtemp(join(this.tempRoot, "resume-ocr-"));
    try {
      const inputPath = join(workDir, "input.pdf");
      await writeFile(inputPath, pdf);
      await this.run(
        this.options.pdftoppmPath,
        ["-r", String(this.options.dpi), "-png", inputPath, join(workDir, PAGE_PREFIX)],
        { signal, maxBuffer: OCR_MAX_BUFFER },
      );

      const pages = (await readdir(workDir))
        .filter((name) => name.startsWith(`${PAGE_PREFIX}-`) && name.endsWith(".png"))
        .sort(comparePageImages);

      const texts: string[] = [];
      let lastFailure: unknown;
      for (const page of pages) {
        try {
          const { stdout } = await this.run(
            this.options.tesseractPath,
            [join(workDir, page), "stdout", "-l", this.options.language],
            { signal, maxBuffer: OCR_MAX_BUFFER },
          );
          texts.push(stdout.trim());
        } catch (error) {
          if (signal?.aborted) {
            throw error;
          }
          lastFailure = error;
          this.logger.warn("ingestion.ocr.page_failed", { page: pageNumber(page), error: errorMessage(error) });
        }
      }
      if (pages.length > 0 && texts.length === 0) {
        throw lastFailure;
      }

      this.logger.debug("ingestion.ocr.pages_recognized", {
        pages: pages.length,
        chars: texts.reduce((sum, text) => sum + text.length, 0),
      });

      return {
        text: texts.filter(Boolean).join("\n\n"),
        pageCount: pages.length,
      };
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

function comparePageImages(a: string, b: string): number {
  return pageNumber(a) - pageNumber(b);
}

function pageNumber(name: string): number {
  const match = name.match(/-(\d+)\.png$/);
  return match ? Number(match[1]) : 0;
}
